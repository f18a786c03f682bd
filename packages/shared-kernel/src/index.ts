export * from './constants';
export * from './dtos';
export * from './enums';
export * from './errors';
export * from './response';
