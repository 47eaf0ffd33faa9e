export type VariantKind = 'default' | 'library' | 'test';

export type ProjectType = 'application' | 'library';

export interface FlavorOptions {
  packageName?: string;
  testPackageName?: string;
  testInstrumentationRunner?: string;
  versionCode?: number;
  versionName?: string;
  minSdkVersion?: number;
  targetSdkVersion?: number;
}

export interface BuildType {
  readonly name: string;
  readonly packageNameSuffix: string;
  readonly versionNameSuffix?: string;
  readonly debuggable: boolean;
}

export interface SourceSet {
  readonly name: string;
  readonly manifest: string;
  readonly resources?: string;
  readonly compileClasspath: readonly string[];
}

/**
 * A library module in the dependency graph. Two dependencies are the same
 * only when they are the same object.
 */
export interface LibraryDependency {
  readonly name: string;
  readonly manifest: string;
  readonly resources?: string;
  readonly jar: string;
  readonly dependencies: readonly LibraryDependency[];
}

export interface JarDependency {
  readonly path: string;
  readonly compiled: boolean;
  readonly packaged: boolean;
}

export interface ManifestReader {
  getPackage(manifestPath: string): string;
}

export interface FileChecker {
  isFile(filePath: string): boolean;
}

// Shapes of variant-config.json, after Joi has applied defaults.

export interface SourceSetEntry {
  manifest?: string;
  /** `null` declares a source set without resources. */
  resources?: string | null;
  compileClasspath: string[];
}

export interface FlavorEntry extends FlavorOptions {
  dimension?: string;
}

export interface BuildTypeEntry {
  packageNameSuffix: string;
  versionNameSuffix?: string;
  debuggable: boolean;
}

export interface LibraryEntry {
  manifest: string;
  resources?: string;
  jar: string;
  dependencies: string[];
}

export interface JarEntry {
  path: string;
  compiled: boolean;
  packaged: boolean;
}

export interface ProjectConfiguration {
  version: string;
  type: ProjectType;
  defaultConfig: FlavorOptions;
  sourceSets: Record<string, SourceSetEntry>;
  buildTypes: Record<string, BuildTypeEntry>;
  flavorDimensions: string[];
  productFlavors: Record<string, FlavorEntry>;
  libraries: Record<string, LibraryEntry>;
  dependencies: string[];
  testDependencies: string[];
  jars: JarEntry[];
  testBuildType: string;
  outputDir: string;
}

export interface VariantSelection {
  flavors: string[];
  buildType: string;
}

export interface VariantDescriptor extends VariantSelection {
  name: string;
  test: boolean;
}
