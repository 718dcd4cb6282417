export { GLOBAL, LOCAL } from './namespaces';
export type { PredefinedNamespace } from './namespaces';
