export * from './MemoryTransport';
export * from './RestTransport';
