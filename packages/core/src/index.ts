export const name = '@cyforge/core';

export * from './annotate/annotator';
export * from './scheduler/report';
export * from './scheduler/scheduler';
export * from './lifecycle/states';
export * from './lifecycle/cleaner';
export * from './lifecycle/toolchain';
export * from './lifecycle/controller';
export * from './lifecycle/pipeline';
export * from './config/loader';
export * from './packaging';
export * from './artifacts/list';
