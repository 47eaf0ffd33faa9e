import * as fs from 'fs-extra';
import * as path from 'path';
import {
  BuildType,
  LibraryDependency,
  ProjectConfiguration,
  SourceSet,
  VariantDescriptor,
  VariantSelection
} from './types';
import {
  CONFIG_FILE,
  MAIN_SOURCE_SET,
  MANIFEST_FILE,
  RESOURCES_DIR,
  SOURCE_ROOT,
  TEST_SOURCE_SET,
  TEST_VARIANT_SUFFIX,
  projectSchema
} from './constants';
import { ProductFlavor } from './product-flavor';
import { VariantCollaborators, VariantConfig } from './variant-config';
import { ProjectConfigurationError, errorMessage } from './errors';

export interface Project {
  /** Directory holding the project file; relative paths resolve against it. */
  readonly root: string;
  readonly config: ProjectConfiguration;
  readonly libraries: ReadonlyMap<string, LibraryDependency>;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function variantName(selection: VariantSelection): string {
  const [first, ...rest] = [...selection.flavors, selection.buildType];
  return first + rest.map(capitalize).join('');
}

export async function loadProject(configPath: string = path.resolve(CONFIG_FILE)): Promise<Project> {
  if (!await fs.pathExists(configPath)) {
    throw new ProjectConfigurationError(`Configuration file ${configPath} not found`);
  }

  let data: unknown;
  try {
    data = await fs.readJson(configPath);
  } catch (error) {
    throw new ProjectConfigurationError(`Failed to read configuration: ${errorMessage(error)}`);
  }

  return parseProject(data, path.dirname(path.resolve(configPath)));
}

export function parseProject(data: unknown, root: string): Project {
  const { error, value } = projectSchema.validate(data, { abortEarly: false });
  if (error || !value) {
    throw new ProjectConfigurationError(
      `Configuration validation failed: ${error?.message ?? 'empty configuration'}`,
      error?.details
    );
  }

  const config: ProjectConfiguration = value;
  if (!config.buildTypes[config.testBuildType]) {
    throw new ProjectConfigurationError(
      `Test build type '${config.testBuildType}' is not a configured build type`
    );
  }

  checkFlavorDimensions(config);

  return { root, config, libraries: buildLibraryGraph(config, root) };
}

function checkFlavorDimensions(config: ProjectConfiguration): void {
  const dimensions = config.flavorDimensions;
  if (dimensions.length === 0) {
    return;
  }

  for (const [name, flavor] of Object.entries(config.productFlavors)) {
    if (!flavor.dimension || !dimensions.includes(flavor.dimension)) {
      throw new ProjectConfigurationError(
        `Flavor '${name}' must belong to one of the dimensions: ${dimensions.join(', ')}`
      );
    }
  }

  for (const dimension of dimensions) {
    if (!Object.values(config.productFlavors).some((flavor) => flavor.dimension === dimension)) {
      throw new ProjectConfigurationError(`Flavor dimension '${dimension}' has no flavors`);
    }
  }
}

/**
 * Creates one node per declared library. A library reached from several
 * places is the same node, so the flattener can collapse it.
 */
function buildLibraryGraph(config: ProjectConfiguration, root: string): Map<string, LibraryDependency> {
  const built = new Map<string, LibraryDependency>();
  const visiting: string[] = [];

  const build = (name: string, requiredBy: string): LibraryDependency => {
    const existing = built.get(name);
    if (existing) {
      return existing;
    }

    const entry = config.libraries[name];
    if (!entry) {
      throw new ProjectConfigurationError(`Unknown library '${name}' required by ${requiredBy}`);
    }
    if (visiting.includes(name)) {
      const cycle = [...visiting.slice(visiting.indexOf(name)), name].join(' -> ');
      throw new ProjectConfigurationError(`Library dependency cycle: ${cycle}`);
    }

    visiting.push(name);
    const dependencies = entry.dependencies.map((dependency) => build(dependency, `library '${name}'`));
    visiting.pop();

    const library: LibraryDependency = {
      name,
      manifest: path.resolve(root, entry.manifest),
      resources: entry.resources ? path.resolve(root, entry.resources) : undefined,
      jar: path.resolve(root, entry.jar),
      dependencies
    };
    built.set(name, library);
    return library;
  };

  for (const name of Object.keys(config.libraries)) {
    build(name, 'the project');
  }
  for (const name of [...config.dependencies, ...config.testDependencies]) {
    build(name, 'the project');
  }

  return built;
}

/**
 * Source sets follow the `src/<name>/` layout unless the project file says
 * otherwise. A `resources: null` entry declares a source set without
 * resources.
 */
export function sourceSetFor(project: Project, name: string): SourceSet {
  const entry = project.config.sourceSets[name];
  const dir = path.join(SOURCE_ROOT, name);
  const resources = entry?.resources === null
    ? undefined
    : path.resolve(project.root, entry?.resources ?? path.join(dir, RESOURCES_DIR));

  return {
    name,
    manifest: path.resolve(project.root, entry?.manifest ?? path.join(dir, MANIFEST_FILE)),
    resources,
    compileClasspath: (entry?.compileClasspath ?? []).map((entryPath) => path.resolve(project.root, entryPath))
  };
}

function buildTypeFor(project: Project, name: string): BuildType {
  const entry = project.config.buildTypes[name];
  if (!entry) {
    throw new ProjectConfigurationError(`Build type '${name}' is not configured`);
  }
  return {
    name,
    packageNameSuffix: entry.packageNameSuffix,
    versionNameSuffix: entry.versionNameSuffix,
    debuggable: entry.debuggable
  };
}

function flavorFor(project: Project, name: string): ProductFlavor {
  const options = project.config.productFlavors[name];
  if (!options) {
    throw new ProjectConfigurationError(`Flavor '${name}' is not configured`);
  }
  return new ProductFlavor(name, options);
}

function librariesFor(project: Project, names: readonly string[]): LibraryDependency[] {
  return names.map((name) => {
    const library = project.libraries.get(name);
    if (!library) {
      throw new ProjectConfigurationError(`Unknown library '${name}'`);
    }
    return library;
  });
}

/**
 * One flavor of each dimension, in dimension order, so later dimensions
 * override earlier ones. Without dimensions every flavor stands alone.
 */
function flavorCombinations(config: ProjectConfiguration): string[][] {
  const flavors = Object.keys(config.productFlavors);
  if (config.flavorDimensions.length === 0) {
    return flavors.length > 0 ? flavors.map((flavor) => [flavor]) : [[]];
  }

  return config.flavorDimensions.reduce<string[][]>((combinations, dimension) => {
    const inDimension = flavors.filter((flavor) => config.productFlavors[flavor].dimension === dimension);
    return combinations.flatMap((combination) => inDimension.map((flavor) => [...combination, flavor]));
  }, [[]]);
}

/**
 * Every flavor combination with every build type, or the build types alone
 * without flavors. Variants on the test build type get a test variant.
 */
export function listVariants(project: Project): VariantDescriptor[] {
  const buildTypes = Object.keys(project.config.buildTypes);

  const variants: VariantDescriptor[] = [];
  for (const flavorList of flavorCombinations(project.config)) {
    for (const buildType of buildTypes) {
      const selection = { flavors: flavorList, buildType };
      const name = variantName(selection);
      variants.push({ ...selection, name, test: false });
      if (buildType === project.config.testBuildType) {
        variants.push({ ...selection, name: name + TEST_VARIANT_SUFFIX, test: true });
      }
    }
  }
  return variants;
}

export function createVariant(
  project: Project,
  selection: VariantSelection,
  collaborators: VariantCollaborators = {}
): VariantConfig {
  const { config } = project;
  const buildType = buildTypeFor(project, selection.buildType);
  const flavors = selection.flavors.map((name) => flavorFor(project, name));
  const mainSourceSet = sourceSetFor(project, MAIN_SOURCE_SET);

  const variant = new VariantConfig(
    new ProductFlavor(MAIN_SOURCE_SET, config.defaultConfig),
    mainSourceSet,
    buildType,
    sourceSetFor(project, buildType.name),
    config.type === 'library' ? { kind: 'library' } : { kind: 'default' },
    collaborators
  );

  for (const flavor of flavors) {
    variant.addFlavor(flavor, sourceSetFor(project, flavor.name));
  }

  variant.setJarDependencies(config.jars.map((jar) => ({ ...jar, path: path.resolve(project.root, jar.path) })));
  variant.setDependencies(librariesFor(project, config.dependencies));

  if (config.type === 'library') {
    const name = variantName(selection);
    variant.setOutputArtifact({
      name,
      manifest: mainSourceSet.manifest,
      resources: mainSourceSet.resources,
      jar: path.resolve(project.root, config.outputDir, `${name}.jar`),
      dependencies: variant.getDirectDependencies()
    });
  }

  return variant;
}

/**
 * The test variant of `tested`. It uses the `androidTest` source sets and
 * the project's test dependencies.
 */
export function createTestVariant(
  project: Project,
  tested: VariantConfig,
  collaborators: VariantCollaborators = {}
): VariantConfig {
  const variant = new VariantConfig(
    tested.getDefaultConfig(),
    sourceSetFor(project, TEST_SOURCE_SET),
    tested.getBuildType(),
    undefined,
    { kind: 'test', testedConfig: tested },
    collaborators
  );

  for (const flavor of tested.getFlavorConfigs()) {
    variant.addFlavor(flavor, sourceSetFor(project, TEST_SOURCE_SET + capitalize(flavor.name)));
  }

  variant.setDependencies(librariesFor(project, project.config.testDependencies));
  return variant;
}

export function resolveVariant(
  project: Project,
  name: string,
  collaborators: VariantCollaborators = {}
): VariantConfig {
  const descriptor = listVariants(project).find((variant) => variant.name === name);
  if (!descriptor) {
    throw new ProjectConfigurationError(`Variant '${name}' does not exist`);
  }

  const variant = createVariant(project, descriptor, collaborators);
  return descriptor.test ? createTestVariant(project, variant, collaborators) : variant;
}
