export * from './errors';
export * from './timestamps';
export * from './schema';
export * from './filters';
export * from './logger';
export * from './config';
export * from './recordStore';
export * from './remote';
export * from './selector';
export * from './versioning';
export * from './checksum';
export * from './calibrationStore';
