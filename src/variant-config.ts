import {
  BuildType,
  FileChecker,
  JarDependency,
  LibraryDependency,
  ManifestReader,
  SourceSet,
  VariantKind
} from './types';
import { ProductFlavor, composePackageName } from './product-flavor';
import { flattenDependencies } from './dependency-flattener';
import { XmlManifestReader, defaultFileChecker } from './manifest-reader';
import {
  MissingManifestError,
  StructuralInvariantViolationError,
  UnresolvedPackageNameError
} from './errors';
import {
  DEFAULT_TEST_RUNNER,
  LIBRARY_PACKAGE_SEPARATOR,
  TEST_PACKAGE_SUFFIX
} from './constants';

/**
 * What a variant is built as. Only a library carries an output artifact,
 * and only a test variant carries the variant it tests.
 */
export type VariantRole =
  | { kind: 'default' }
  | { kind: 'library'; output?: LibraryDependency }
  | { kind: 'test'; testedConfig: VariantConfig };

export interface VariantCollaborators {
  manifestReader?: ManifestReader;
  fileChecker?: FileChecker;
}

export class VariantConfig {
  private readonly defaultConfig: ProductFlavor;
  private readonly defaultSourceSet: SourceSet;
  private readonly buildType: BuildType;
  private readonly buildTypeSourceSet: SourceSet | undefined;

  private readonly flavorConfigs: ProductFlavor[] = [];
  private readonly flavorSourceSets: SourceSet[] = [];

  private role: VariantRole;
  private mergedFlavor: ProductFlavor;

  private jars: JarDependency[] = [];
  private directDependencies: LibraryDependency[] = [];
  /** Earlier libraries override the resources of later ones. */
  private flatDependencies: LibraryDependency[] = [];

  private readonly manifestReader: ManifestReader;
  private readonly fileChecker: FileChecker;

  constructor(
    defaultConfig: ProductFlavor,
    defaultSourceSet: SourceSet,
    buildType: BuildType,
    buildTypeSourceSet: SourceSet | undefined,
    role: VariantRole = { kind: 'default' },
    collaborators: VariantCollaborators = {}
  ) {
    this.defaultConfig = defaultConfig;
    this.defaultSourceSet = defaultSourceSet;
    this.buildType = buildType;
    this.buildTypeSourceSet = buildTypeSourceSet;
    this.role = role;
    this.mergedFlavor = defaultConfig;
    this.manifestReader = collaborators.manifestReader ?? new XmlManifestReader();
    this.fileChecker = collaborators.fileChecker ?? defaultFileChecker;

    if (role.kind === 'test' && !(role.testedConfig instanceof VariantConfig)) {
      throw new StructuralInvariantViolationError('A test variant requires a tested variant');
    }

    this.validate();
  }

  /**
   * Adds a flavor. Flavors added later override earlier ones in the merged
   * flavor; for resources, earlier added flavors take priority.
   */
  addFlavor(flavor: ProductFlavor, sourceSet: SourceSet): void {
    this.flavorConfigs.push(flavor);
    this.flavorSourceSets.push(sourceSet);
    this.mergedFlavor = flavor.mergeOver(this.mergedFlavor);
  }

  setJarDependencies(jars: readonly JarDependency[]): void {
    this.jars = [...jars];
  }

  /**
   * Replaces the direct library dependencies and recomputes the flat list.
   * Each library carries its own dependencies.
   */
  setDependencies(directDependencies: readonly LibraryDependency[]): void {
    this.directDependencies = [...directDependencies];
    this.flatDependencies = flattenDependencies(this.getFullDirectDependencies());
  }

  setOutputArtifact(output: LibraryDependency): void {
    if (this.role.kind !== 'library') {
      throw new StructuralInvariantViolationError(
        `Only a library variant has an output artifact, this variant is '${this.role.kind}'`
      );
    }
    this.role = { kind: 'library', output };
  }

  /**
   * Direct dependencies, followed by the tested library and its own direct
   * dependencies when this variant tests a library.
   */
  getFullDirectDependencies(): LibraryDependency[] {
    const testedLibrary = this.getTestedLibrary();
    if (testedLibrary) {
      return [
        ...this.directDependencies,
        testedLibrary.output,
        ...testedLibrary.config.directDependencies
      ];
    }
    return [...this.directDependencies];
  }

  getKind(): VariantKind {
    return this.role.kind;
  }

  getTestedConfig(): VariantConfig | undefined {
    return this.role.kind === 'test' ? this.role.testedConfig : undefined;
  }

  getOutputArtifact(): LibraryDependency | undefined {
    return this.role.kind === 'library' ? this.role.output : undefined;
  }

  getDefaultConfig(): ProductFlavor {
    return this.defaultConfig;
  }

  getDefaultSourceSet(): SourceSet {
    return this.defaultSourceSet;
  }

  getMergedFlavor(): ProductFlavor {
    return this.mergedFlavor;
  }

  getBuildType(): BuildType {
    return this.buildType;
  }

  getBuildTypeSourceSet(): SourceSet | undefined {
    return this.buildTypeSourceSet;
  }

  hasFlavors(): boolean {
    return this.flavorConfigs.length > 0;
  }

  getFlavorConfigs(): readonly ProductFlavor[] {
    return this.flavorConfigs;
  }

  getFlavorSourceSets(): readonly SourceSet[] {
    return this.flavorSourceSets;
  }

  hasLibraries(): boolean {
    return this.directDependencies.length > 0;
  }

  getDirectDependencies(): readonly LibraryDependency[] {
    return this.directDependencies;
  }

  getFlatDependencies(): readonly LibraryDependency[] {
    return this.flatDependencies;
  }

  getJarDependencies(): readonly JarDependency[] {
    return this.jars;
  }

  /**
   * The package of this variant, from the flavors and build type or else
   * from the manifest. A test variant without an explicit test package
   * uses the tested package with a `.test` suffix.
   */
  getPackageName(): string {
    if (this.role.kind === 'test') {
      const testPackageName = this.mergedFlavor.testPackageName;
      if (testPackageName) {
        return testPackageName;
      }
      return this.role.testedConfig.getPackageName() + TEST_PACKAGE_SUFFIX;
    }

    return this.getPackageOverride() ?? this.getPackageFromManifest();
  }

  getTestedPackageName(): string | undefined {
    if (this.role.kind !== 'test') {
      return undefined;
    }

    const tested = this.role.testedConfig;
    // The tested library is packaged into the test application itself.
    return tested.getKind() === 'library' ? this.getPackageName() : tested.getPackageName();
  }

  /**
   * Package name coming from the flavors and the build type suffix, or
   * undefined when neither overrides it.
   */
  getPackageOverride(): string | undefined {
    const packageName = this.mergedFlavor.packageName;
    const suffix = this.buildType.packageNameSuffix;

    if (suffix) {
      return composePackageName(packageName || this.getPackageFromManifest(), suffix);
    }
    return packageName || undefined;
  }

  getPackageFromManifest(): string {
    const manifestPath = this.defaultSourceSet.manifest;
    const packageName = this.manifestReader.getPackage(manifestPath);
    if (!packageName) {
      throw new UnresolvedPackageNameError(manifestPath);
    }
    return packageName;
  }

  getInstrumentationRunner(): string {
    return this.mergedFlavor.testInstrumentationRunner || DEFAULT_TEST_RUNNER;
  }

  getVersionCode(): number | undefined {
    return this.mergedFlavor.versionCode;
  }

  getVersionName(): string | undefined {
    const versionName = this.mergedFlavor.versionName;
    const suffix = this.buildType.versionNameSuffix;
    if (versionName && suffix) {
      return versionName + suffix;
    }
    return versionName;
  }

  getMinSdkVersion(): number | undefined {
    return this.mergedFlavor.minSdkVersion;
  }

  getTargetSdkVersion(): number | undefined {
    return this.mergedFlavor.targetSdkVersion;
  }

  /**
   * Manifest packages of all flattened libraries, in flat order, joined
   * with ':'. Undefined when the variant has no libraries.
   */
  getLibraryPackages(): string | undefined {
    if (this.flatDependencies.length === 0) {
      return undefined;
    }
    return this.flatDependencies
      .map((library) => this.manifestReader.getPackage(library.manifest))
      .join(LIBRARY_PACKAGE_SEPARATOR);
  }

  /**
   * Resource folders in overlay order: build type, flavors in the order
   * they were added, the default source set, then the flattened libraries.
   */
  getResourceInputs(): string[] {
    const inputs: string[] = [];

    if (this.buildTypeSourceSet?.resources) {
      inputs.push(this.buildTypeSourceSet.resources);
    }

    for (const sourceSet of this.flavorSourceSets) {
      if (sourceSet.resources) {
        inputs.push(sourceSet.resources);
      }
    }

    if (this.defaultSourceSet.resources) {
      inputs.push(this.defaultSourceSet.resources);
    }

    for (const library of this.flatDependencies) {
      if (library.resources) {
        inputs.push(library.resources);
      }
    }

    return inputs;
  }

  /**
   * Compile classpath of this variant. A test of a library also gets the
   * library's output and the library's own classpath.
   */
  getCompileClasspath(): Set<string> {
    const classpath = new Set<string>(this.defaultSourceSet.compileClasspath);

    for (const entry of this.buildTypeSourceSet?.compileClasspath ?? []) {
      classpath.add(entry);
    }

    for (const sourceSet of this.flavorSourceSets) {
      for (const entry of sourceSet.compileClasspath) {
        classpath.add(entry);
      }
    }

    const testedLibrary = this.getTestedLibrary();
    if (testedLibrary) {
      classpath.add(testedLibrary.output.jar);
      for (const entry of testedLibrary.config.getCompileClasspath()) {
        classpath.add(entry);
      }
    }

    return classpath;
  }

  private getTestedLibrary(): { config: VariantConfig; output: LibraryDependency } | undefined {
    if (this.role.kind !== 'test') {
      return undefined;
    }

    const tested = this.role.testedConfig;
    if (tested.role.kind !== 'library') {
      return undefined;
    }
    if (!tested.role.output) {
      throw new StructuralInvariantViolationError(
        'The tested library variant has no output artifact; set it before resolving dependencies'
      );
    }
    return { config: tested, output: tested.role.output };
  }

  protected validate(): void {
    if (this.role.kind === 'test') {
      return;
    }

    const manifest = this.defaultSourceSet.manifest;
    if (!this.fileChecker.isFile(manifest)) {
      throw new MissingManifestError(manifest);
    }
  }
}
