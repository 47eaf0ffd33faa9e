import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { VariantKind } from './types';
import {
  CONFIG_FILE,
  MAIN_SOURCE_SET,
  MANIFEST_FILE,
  RESOURCES_DIR,
  SOURCE_ROOT,
  TEST_SOURCE_SET
} from './constants';
import { Project, listVariants, loadProject, resolveVariant } from './project-loader';
import { VariantCollaborators, VariantConfig } from './variant-config';
import { errorMessage } from './errors';

export interface VariantSummary {
  kind: VariantKind;
  packageName: string;
  testedPackageName?: string;
  instrumentationRunner: string;
  versionCode?: number;
  versionName?: string;
  minSdkVersion?: number;
  targetSdkVersion?: number;
  resourceInputs: string[];
  compileClasspath: string[];
  libraries: string[];
  libraryPackages?: string;
}

/**
 * Collects everything a build needs to know about a variant. Paths are
 * relative to `root`.
 */
export function summarizeVariant(variant: VariantConfig, root: string): VariantSummary {
  const relative = (filePath: string) => path.relative(root, filePath) || '.';

  return {
    kind: variant.getKind(),
    packageName: variant.getPackageName(),
    testedPackageName: variant.getTestedPackageName(),
    instrumentationRunner: variant.getInstrumentationRunner(),
    versionCode: variant.getVersionCode(),
    versionName: variant.getVersionName(),
    minSdkVersion: variant.getMinSdkVersion(),
    targetSdkVersion: variant.getTargetSdkVersion(),
    resourceInputs: variant.getResourceInputs().map(relative),
    compileClasspath: [...variant.getCompileClasspath()].map(relative).sort(),
    libraries: variant.getFlatDependencies().map((library) => library.name),
    libraryPackages: variant.getLibraryPackages()
  };
}

export class VariantInspector {
  private project: Project | null = null;
  private readonly configPath: string;
  private readonly collaborators: VariantCollaborators;

  constructor(configPath: string = CONFIG_FILE, collaborators: VariantCollaborators = {}) {
    this.configPath = configPath;
    this.collaborators = collaborators;
  }

  async init(): Promise<void> {
    try {
      await this.loadConfig();
    } catch (error) {
      console.error(chalk.red('Initialization failed:'), errorMessage(error));
      process.exit(1);
    }
  }

  async loadConfig(): Promise<void> {
    this.project = await loadProject(path.resolve(this.configPath));
    console.log(chalk.green('✓'), 'Configuration loaded successfully');
  }

  listVariants(): void {
    if (!this.project) throw new Error('Configuration not loaded');

    console.log(chalk.bold('\n📋 Variants:\n'));
    for (const variant of listVariants(this.project)) {
      const marker = variant.test ? chalk.gray(' [TEST]') : '';
      console.log(`  ${variant.name}${marker}`);
    }
    console.log('');
  }

  resolve(name: string): VariantConfig {
    if (!this.project) throw new Error('Configuration not loaded');
    return resolveVariant(this.project, name, this.collaborators);
  }

  async showVariant(name: string): Promise<void> {
    if (!this.project) throw new Error('Configuration not loaded');

    try {
      const summary = summarizeVariant(this.resolve(name), this.project.root);
      this.printSummary(name, summary);
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  }

  private printSummary(name: string, summary: VariantSummary): void {
    console.log(chalk.bold(`\n📦 Variant: ${name}\n`));

    console.log(chalk.cyan('Kind:'), summary.kind);
    console.log(chalk.cyan('Package:'), summary.packageName);
    if (summary.testedPackageName) {
      console.log(chalk.cyan('Tested package:'), summary.testedPackageName);
    }
    console.log(chalk.cyan('Instrumentation runner:'), summary.instrumentationRunner);
    if (summary.versionName !== undefined || summary.versionCode !== undefined) {
      console.log(chalk.cyan('Version:'), `${summary.versionName ?? '-'} (${summary.versionCode ?? '-'})`);
    }
    if (summary.minSdkVersion !== undefined || summary.targetSdkVersion !== undefined) {
      console.log(chalk.cyan('SDK:'), `min ${summary.minSdkVersion ?? '-'}, target ${summary.targetSdkVersion ?? '-'}`);
    }

    console.log(chalk.bold('\n📁 Resource inputs:\n'));
    for (const input of summary.resourceInputs) {
      console.log(`  ${input}`);
    }

    console.log(chalk.bold('\n🧩 Compile classpath:\n'));
    if (summary.compileClasspath.length === 0) {
      console.log(chalk.gray('  (empty)'));
    }
    for (const entry of summary.compileClasspath) {
      console.log(`  ${entry}`);
    }

    console.log(chalk.bold('\n📚 Libraries:\n'));
    if (summary.libraries.length === 0) {
      console.log(chalk.gray('  (none)'));
    }
    for (const library of summary.libraries) {
      console.log(`  ${library}`);
    }
    if (summary.libraryPackages) {
      console.log(chalk.gray(`  packages: ${summary.libraryPackages}`));
    }

    console.log('');
  }

  async interactiveShow(): Promise<void> {
    if (!this.project) throw new Error('Configuration not loaded');

    const choices = listVariants(this.project).map((variant) => ({
      name: variant.test ? `${variant.name} [TEST]` : variant.name,
      value: variant.name
    }));

    const { selectedVariant } = await inquirer.prompt<{ selectedVariant: string }>([
      {
        type: 'list',
        name: 'selectedVariant',
        message: 'Select a variant to inspect:',
        choices
      }
    ]);

    await this.showVariant(selectedVariant);
  }

  async validate(): Promise<void> {
    if (!this.project) throw new Error('Configuration not loaded');

    console.log(chalk.bold('\n🔍 Validating Variants\n'));

    let hasErrors = false;

    for (const variant of listVariants(this.project)) {
      try {
        const packageName = this.resolve(variant.name).getPackageName();
        console.log(chalk.green('✓'), `${variant.name} → ${packageName}`);
      } catch (error) {
        console.error(chalk.red('✗'), `${variant.name}: ${errorMessage(error)}`);
        hasErrors = true;
      }
    }

    if (!hasErrors) {
      console.log(chalk.green('\n✓ All validations passed'));
    } else {
      console.log(chalk.red('\n✗ Validation failed'));
      process.exit(1);
    }
  }

  static async initProject(): Promise<void> {
    console.log(chalk.bold('🚀 Initializing Variant Resolver\n'));

    if (await fs.pathExists(CONFIG_FILE)) {
      console.log(chalk.yellow('Variant Resolver is already initialized'));
      return;
    }

    const defaultConfig = {
      version: '1.0.0',
      type: 'application',
      defaultConfig: {
        versionCode: 1,
        versionName: '1.0',
        minSdkVersion: 21
      },
      buildTypes: {
        debug: { packageNameSuffix: '.debug', versionNameSuffix: '-debug', debuggable: true },
        release: { packageNameSuffix: '', debuggable: false }
      },
      productFlavors: {
        free: { packageName: 'com.example.app.free' },
        paid: { packageName: 'com.example.app.paid', versionCode: 2 }
      },
      libraries: {
        core: {
          manifest: 'libs/core/AndroidManifest.xml',
          resources: 'libs/core/res',
          jar: 'libs/core/core.jar'
        }
      },
      dependencies: ['core']
    };

    await fs.writeJson(CONFIG_FILE, defaultConfig, { spaces: 2 });
    console.log(chalk.green('✓'), `Created ${CONFIG_FILE}`);

    const manifests: Array<[string, string]> = [
      [path.join(SOURCE_ROOT, MAIN_SOURCE_SET), 'com.example.app'],
      [path.join(SOURCE_ROOT, TEST_SOURCE_SET), 'com.example.app.test'],
      [path.join('libs', 'core'), 'com.example.core']
    ];

    for (const [dir, packageName] of manifests) {
      await fs.ensureDir(path.join(dir, RESOURCES_DIR));
      await fs.writeFile(
        path.join(dir, MANIFEST_FILE),
        `<?xml version="1.0" encoding="utf-8"?>\n<manifest package="${packageName}" />\n`
      );
    }

    console.log(chalk.green('✓'), 'Created example source sets');

    console.log(chalk.green('\n✓ Variant Resolver initialized successfully!'));
    console.log(chalk.gray('\nNext steps:'));
    console.log(chalk.gray(`1. Edit ${CONFIG_FILE} to describe your flavors, build types and libraries`));
    console.log(chalk.gray('2. Run "variant-resolver list" to see the variants'));
    console.log(chalk.gray('3. Run "variant-resolver show <variant>" to inspect one'));
  }
}
