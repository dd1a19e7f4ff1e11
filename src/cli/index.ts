export * from './cli.utils';
export * from './file-processor';
export * from './main';
export * from './output';
