export * from './bridge';
export * from './bridge-config';
