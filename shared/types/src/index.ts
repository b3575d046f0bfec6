// Shared types for the liability miner

export * from './errors';
export * from './chain';
export * from './lighthouse';
export * from './liability';
export * from './rounds';
export * from './phases';
