export * from './instance';
export * from './props';
export * from './SchemaRegistry';
export * from './suppressors';
export * from './validators';
