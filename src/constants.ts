import Joi from 'joi';
import { FlavorEntry, ProjectConfiguration } from './types';

export const CONFIG_FILE = 'variant-config.json';
export const MANIFEST_FILE = 'AndroidManifest.xml';
export const RESOURCES_DIR = 'res';
export const SOURCE_ROOT = 'src';
export const MAIN_SOURCE_SET = 'main';
export const TEST_SOURCE_SET = 'androidTest';
export const TEST_VARIANT_SUFFIX = 'Test';
export const TEST_PACKAGE_SUFFIX = '.test';
export const DEFAULT_TEST_RUNNER = 'android.test.InstrumentationTestRunner';
export const LIBRARY_PACKAGE_SEPARATOR = ':';

const flavorSchema = Joi.object<FlavorEntry>({
  packageName: Joi.string().optional(),
  testPackageName: Joi.string().optional(),
  testInstrumentationRunner: Joi.string().optional(),
  versionCode: Joi.number().integer().min(1).optional(),
  versionName: Joi.string().optional(),
  minSdkVersion: Joi.number().integer().min(1).optional(),
  targetSdkVersion: Joi.number().integer().min(1).optional()
});

export const projectSchema = Joi.object<ProjectConfiguration>({
  version: Joi.string().required(),
  type: Joi.string().valid('application', 'library').default('application'),
  defaultConfig: flavorSchema.default({}),
  sourceSets: Joi.object().pattern(
    Joi.string(),
    Joi.object({
      manifest: Joi.string().optional(),
      resources: Joi.string().allow(null).optional(),
      compileClasspath: Joi.array().items(Joi.string()).default([])
    })
  ).default({}),
  buildTypes: Joi.object().pattern(
    Joi.string(),
    Joi.object({
      packageNameSuffix: Joi.string().allow('').default(''),
      versionNameSuffix: Joi.string().optional(),
      debuggable: Joi.boolean().default(false)
    })
  ).min(1).default({
    debug: { packageNameSuffix: '', debuggable: true },
    release: { packageNameSuffix: '', debuggable: false }
  }),
  flavorDimensions: Joi.array().items(Joi.string()).unique().default([]),
  productFlavors: Joi.object().pattern(
    Joi.string(),
    flavorSchema.keys({ dimension: Joi.string().optional() })
  ).default({}),
  libraries: Joi.object().pattern(
    Joi.string(),
    Joi.object({
      manifest: Joi.string().required(),
      resources: Joi.string().optional(),
      jar: Joi.string().required(),
      dependencies: Joi.array().items(Joi.string()).default([])
    })
  ).default({}),
  dependencies: Joi.array().items(Joi.string()).default([]),
  testDependencies: Joi.array().items(Joi.string()).default([]),
  jars: Joi.array().items(
    Joi.object({
      path: Joi.string().required(),
      compiled: Joi.boolean().default(true),
      packaged: Joi.boolean().default(true)
    })
  ).default([]),
  testBuildType: Joi.string().default('debug'),
  outputDir: Joi.string().default('build/outputs')
}).required();
