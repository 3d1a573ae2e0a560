export * from './EngineProvider';
export * from './IdentityResolver';
export * from './ResourceEngine';
export * from './transportErrors';
