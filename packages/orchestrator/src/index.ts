export * from './Address';
export * from './document';
export * from './Orchestrator';
export * from './references';
