/**
 * Jest setup file.
 * Replace the global fetch with a mock so no test reaches the network.
 */

declare const global: { fetch: typeof fetch };

global.fetch = (jest.fn() as unknown) as typeof fetch;

export {};
