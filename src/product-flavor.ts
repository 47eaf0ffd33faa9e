import { FlavorOptions } from './types';

function isSet(value: string | number | undefined): boolean {
  if (typeof value === 'string') {
    return value.length > 0;
  }
  return typeof value === 'number';
}

function pick<T extends string | number>(value: T | undefined, fallback: T | undefined): T | undefined {
  return isSet(value) ? value : fallback;
}

/**
 * A named set of overrides. Flavors never change after construction;
 * merging produces a new flavor.
 */
export class ProductFlavor {
  readonly name: string;
  readonly packageName?: string;
  readonly testPackageName?: string;
  readonly testInstrumentationRunner?: string;
  readonly versionCode?: number;
  readonly versionName?: string;
  readonly minSdkVersion?: number;
  readonly targetSdkVersion?: number;

  constructor(name: string, options: FlavorOptions = {}) {
    this.name = name;
    this.packageName = options.packageName;
    this.testPackageName = options.testPackageName;
    this.testInstrumentationRunner = options.testInstrumentationRunner;
    this.versionCode = options.versionCode;
    this.versionName = options.versionName;
    this.minSdkVersion = options.minSdkVersion;
    this.targetSdkVersion = options.targetSdkVersion;
  }

  /**
   * Returns a flavor holding this flavor's set fields, with every unset
   * field taken from `base`. The result keeps this flavor's name.
   */
  mergeOver(base: ProductFlavor): ProductFlavor {
    return new ProductFlavor(this.name, {
      packageName: pick(this.packageName, base.packageName),
      testPackageName: pick(this.testPackageName, base.testPackageName),
      testInstrumentationRunner: pick(this.testInstrumentationRunner, base.testInstrumentationRunner),
      versionCode: pick(this.versionCode, base.versionCode),
      versionName: pick(this.versionName, base.versionName),
      minSdkVersion: pick(this.minSdkVersion, base.minSdkVersion),
      targetSdkVersion: pick(this.targetSdkVersion, base.targetSdkVersion)
    });
  }
}

/** Last flavor wins; the default config is the final fallback. */
export function mergeFlavors(flavors: readonly ProductFlavor[], defaultConfig: ProductFlavor): ProductFlavor {
  return flavors.reduce((merged, flavor) => flavor.mergeOver(merged), defaultConfig);
}

export function composePackageName(packageName: string, suffix: string | undefined): string {
  if (!suffix) {
    return packageName;
  }
  return suffix.startsWith('.') ? packageName + suffix : `${packageName}.${suffix}`;
}
