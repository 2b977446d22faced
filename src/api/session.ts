import defaultLogger, { Logger } from '../util/logger';
import { Session } from '../scanner';
import { Authenticate } from './auth';

/**
 * Owns the current bearer session. Sessions are never mutated: a renewal
 * replaces the whole value, so fetches still holding the old one are
 * unaffected.
 */
export class SessionManager {
    private session?: Session;
    private inFlight?: Promise<Session>;
    private readonly logger: Logger;

    constructor(private readonly authenticate: Authenticate, options: { logger?: Logger } = {}) {
        this.logger = options.logger ?? defaultLogger;
    }

    async current(): Promise<Session> {
        return this.session ?? this.acquire();
    }

    /**
     * Replaces `stale`. If another caller already renewed it, the newer session
     * is returned without a second login.
     */
    async renew(stale: Session): Promise<Session> {
        if (this.session && this.session.generation > stale.generation) {
            this.logger.debug(`Session already renewed (generation ${this.session.generation})`);
            return this.session;
        }
        return this.acquire();
    }

    private acquire(): Promise<Session> {
        if (!this.inFlight) {
            this.inFlight = this.authenticate()
                .then(token => {
                    const session: Session = {
                        token,
                        generation: (this.session?.generation ?? 0) + 1,
                    };
                    this.session = session;
                    return session;
                })
                .finally(() => {
                    this.inFlight = undefined;
                });
        }
        return this.inFlight;
    }
}
