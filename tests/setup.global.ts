import { afterEach, vi } from 'vitest';

// CLI handlers report failures through process.exitCode and console spies.
afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
});
