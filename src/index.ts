#!/usr/bin/env node

export { VariantConfig } from './variant-config';
export type { VariantRole, VariantCollaborators } from './variant-config';
export { ProductFlavor, mergeFlavors, composePackageName } from './product-flavor';
export { flattenDependencies } from './dependency-flattener';
export { XmlManifestReader, defaultFileChecker } from './manifest-reader';
export * from './project-loader';
export { VariantInspector, summarizeVariant } from './variant-inspector';
export type { VariantSummary } from './variant-inspector';
export * from './errors';
export * from './types';
export * from './constants';

if (require.main === module) {
  const { run }: typeof import('./cli') = require('./cli');
  void run(process.argv);
}
