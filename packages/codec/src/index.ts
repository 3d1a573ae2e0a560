export * from './duration';
export * from './names';
export * from './PropertyCodec';
