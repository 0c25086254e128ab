export * from './engine';
export * from './adapters';
export * from './profile';
export * from './config';
export * from './monitoring';
