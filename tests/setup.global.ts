import { vi } from 'vitest';

process.on('unhandledRejection', (reason: unknown) => {
    console.error('UNHANDLED_REJECTION', reason);
});

// Unit tests must stay in-process
const blockMsg = 'NETWORK BLOCKED: Unit tests must not access external resources. Use vi.spyOn() or mocks.';

vi.mock('http', async (importOriginal) => {
    const actual = await importOriginal<typeof import('http')>();
    return {
        ...actual,
        request: () => { throw new Error(blockMsg); },
        get: () => { throw new Error(blockMsg); },
    };
});

vi.mock('https', async (importOriginal) => {
    const actual = await importOriginal<typeof import('https')>();
    return {
        ...actual,
        request: () => { throw new Error(blockMsg); },
        get: () => { throw new Error(blockMsg); },
    };
});

vi.stubGlobal('fetch', async () => { throw new Error(blockMsg); });
