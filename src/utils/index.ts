export * from './util';
export * from './retry';
export * from './web3';
export * from './logger';
export * from './tx-sender';
