export * from './capitalAllocator';
