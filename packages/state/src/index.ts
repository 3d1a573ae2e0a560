export * from './StateManager';
