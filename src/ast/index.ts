// src/ast/index.ts

export * from './expression';
export * from './template';
