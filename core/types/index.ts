export * from './value';
export * from './object-handle';
export * from './tag';
export * from './sources';
export * from './diagnostics';
