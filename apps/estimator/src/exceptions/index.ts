export * from './estimation.exception';
export * from './estimation-exception.filter';
