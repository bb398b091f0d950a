export * from './types';
export * from './errors';
export * from './config';
export * from './logger';
export * from './ip/address';
export * from './ip/text';
export * from './ip/mask';
export * from './ip/range';
export * from './ip/classify';
export * from './ip/info';
export * from './ip/hostname';

export const CORE_VERSION = '0.1.0';
