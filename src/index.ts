export * from './common.js';
export * from './constants.js';
export * from './errors.js';
export * from './math.js';
export * from './identity.js';
export * from './token.js';
export * from './environment.js';
export * from './model.js';
export * from './properties.js';
export * from './traceUtil.js';
export * from './gen.js';
