export * from './relationship';
export * from './validation';
export * from './property-descriptor';
export * from './property-value';
export * from './property-context';
export * from './configured-properties';
