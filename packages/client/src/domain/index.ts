export * from './configs';
export * from './models';
export * from './ports';
