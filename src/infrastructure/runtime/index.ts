export { default as runtimePlugin } from './runtime-plugin.js';
export type { RuntimePluginOptions } from './runtime-plugin.js';
