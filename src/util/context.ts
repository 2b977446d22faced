import { AsyncLocalStorage } from 'async_hooks';

interface ScanContext {
    label?: string;
}

export const scanContext = new AsyncLocalStorage<ScanContext>();

export function getScanLabel(): string | undefined {
    const store = scanContext.getStore();
    return store?.label;
}

export function runWithScanLabel<T>(label: string, callback: () => T): T {
    return scanContext.run({ label }, callback);
}
