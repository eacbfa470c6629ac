export * from './config';
export * from './constraints';
export * from './dictionary';
export * from './errors';
export * from './feedback';
export * from './filter';
export * from './notation';
export * from './report';
export * from './session';
export * from './state';
export * from './stats';
export * from './suggest';
