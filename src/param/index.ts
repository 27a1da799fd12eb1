export * from './abi';
export * from './constant';
export * from './errors';
export * from './type';
