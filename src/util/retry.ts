import defaultLogger, { Logger } from './logger';

export interface RetryOptions {
    retries?: number;
    delay?: number;
    /** Errors for which this returns false are rethrown immediately. */
    shouldRetry?: (error: unknown) => boolean;
    logger?: Logger;
}

export async function retryOperation<T>(operation: () => Promise<T>, name: string, options: RetryOptions = {}): Promise<T> {
    const { retries = 5, delay = 2000, shouldRetry = () => true, logger = defaultLogger } = options;

    for (let i = 0; i < retries; i++) {
        try {
            return await operation();
        } catch (error) {
            if (i === retries - 1 || !shouldRetry(error)) throw error;
            logger.warn(`Failed to ${name}, retrying in ${delay / 1000}s... (${i + 1}/${retries})`);
            await new Promise(resolve => setTimeout(resolve, delay));
        }
    }
    throw new Error(`Failed to ${name} after ${retries} retries`);
}
