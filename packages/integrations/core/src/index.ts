export * from './contracts';
export * from './field-parsing';
export * from './transport';
export * from './fixture-transport';
