// src/schema/index.ts

export * from './options';
export * from './tree';
export * from './hooks';
export * from './config';
