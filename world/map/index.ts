export * from './mapDef';
export * from './position';
