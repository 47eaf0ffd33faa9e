import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import {
  createTestVariant,
  createVariant,
  listVariants,
  loadProject,
  parseProject,
  resolveVariant,
  sourceSetFor,
  variantName
} from '../src/project-loader';
import { ProjectConfigurationError } from '../src/errors';
import { VariantCollaborators } from '../src/variant-config';

const ROOT = '/project';

function projectData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    version: '1.0.0',
    defaultConfig: { versionName: '1.0' },
    buildTypes: {
      debug: { packageNameSuffix: '.debug', debuggable: true },
      release: {}
    },
    productFlavors: {
      free: { packageName: 'com.example.free' },
      paid: {}
    },
    libraries: {
      core: { manifest: 'libs/core/AndroidManifest.xml', resources: 'libs/core/res', jar: 'libs/core/core.jar' },
      ui: { manifest: 'libs/ui/AndroidManifest.xml', jar: 'libs/ui/ui.jar', dependencies: ['core'] }
    },
    dependencies: ['ui'],
    ...overrides
  };
}

const collaborators: VariantCollaborators = {
  manifestReader: {
    getPackage: (manifestPath: string) => (manifestPath === '/project/src/main/AndroidManifest.xml' ? 'com.example' : '')
  },
  fileChecker: { isFile: () => true }
};

describe('Project loader', () => {
  describe('parseProject', () => {
    it('should apply defaults', () => {
      const project = parseProject({ version: '1.0.0' }, ROOT);

      expect(project.root).toBe(ROOT);
      expect(project.config.type).toBe('application');
      expect(project.config.testBuildType).toBe('debug');
      expect(project.config.outputDir).toBe('build/outputs');
      expect(project.config.jars).toEqual([]);
      expect(project.config.buildTypes).toEqual({
        debug: { packageNameSuffix: '', debuggable: true },
        release: { packageNameSuffix: '', debuggable: false }
      });
    });

    it('should reject a configuration that does not match the schema', () => {
      try {
        parseProject({ type: 'plugin' }, ROOT);
        throw new Error('expected a ProjectConfigurationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ProjectConfigurationError);
        if (error instanceof ProjectConfigurationError) {
          expect(error.message).toContain('Configuration validation failed');
          expect(error.details.map((detail) => detail.path.join('.'))).toEqual(['version', 'type']);
        }
      }
    });

    it('should reject an unknown test build type', () => {
      expect(() => parseProject(projectData({ testBuildType: 'staging' }), ROOT)).toThrow(
        "Test build type 'staging' is not a configured build type"
      );
    });

    it('should share library nodes across the graph', () => {
      const project = parseProject(projectData(), ROOT);
      const ui = project.libraries.get('ui');
      const core = project.libraries.get('core');

      expect(ui?.dependencies[0]).toBe(core);
      expect(core?.jar).toBe('/project/libs/core/core.jar');
      expect(ui?.resources).toBeUndefined();
    });

    it('should reject unknown libraries', () => {
      const data = projectData({
        libraries: { ui: { manifest: 'ui.xml', jar: 'ui.jar', dependencies: ['missing'] } }
      });

      expect(() => parseProject(data, ROOT)).toThrow("Unknown library 'missing' required by library 'ui'");
    });

    it('should reject dependency cycles', () => {
      const data = projectData({
        libraries: {
          a: { manifest: 'a.xml', jar: 'a.jar', dependencies: ['b'] },
          b: { manifest: 'b.xml', jar: 'b.jar', dependencies: ['a'] }
        },
        dependencies: []
      });

      expect(() => parseProject(data, ROOT)).toThrow('Library dependency cycle: a -> b -> a');
    });
  });

  describe('Source sets', () => {
    it('should follow the conventional layout', () => {
      const project = parseProject(projectData(), ROOT);

      expect(sourceSetFor(project, 'free')).toEqual({
        name: 'free',
        manifest: '/project/src/free/AndroidManifest.xml',
        resources: '/project/src/free/res',
        compileClasspath: []
      });
    });

    it('should honour declared paths', () => {
      const project = parseProject(projectData({
        sourceSets: {
          main: { manifest: 'AndroidManifest.xml', resources: null, compileClasspath: ['libs/x.jar'] }
        }
      }), ROOT);

      expect(sourceSetFor(project, 'main')).toEqual({
        name: 'main',
        manifest: '/project/AndroidManifest.xml',
        resources: undefined,
        compileClasspath: ['/project/libs/x.jar']
      });
    });
  });

  describe('listVariants', () => {
    it('should combine each flavor with each build type', () => {
      const project = parseProject(projectData(), ROOT);

      expect(listVariants(project).map((variant) => variant.name)).toEqual([
        'freeDebug',
        'freeDebugTest',
        'freeRelease',
        'paidDebug',
        'paidDebugTest',
        'paidRelease'
      ]);
    });

    it('should use build types alone without flavors', () => {
      const project = parseProject(projectData({ productFlavors: {} }), ROOT);

      expect(listVariants(project).map((variant) => variant.name)).toEqual(['debug', 'debugTest', 'release']);
    });

    it('should combine one flavor of each dimension', () => {
      const project = parseProject(projectData({
        flavorDimensions: ['tier', 'abi'],
        productFlavors: {
          free: { dimension: 'tier', packageName: 'com.example.free' },
          paid: { dimension: 'tier' },
          arm: { dimension: 'abi', versionCode: 2 },
          x86: { dimension: 'abi', versionCode: 3 }
        },
        buildTypes: { debug: {} }
      }), ROOT);

      expect(listVariants(project).map((variant) => variant.name)).toEqual([
        'freeArmDebug',
        'freeArmDebugTest',
        'freeX86Debug',
        'freeX86DebugTest',
        'paidArmDebug',
        'paidArmDebugTest',
        'paidX86Debug',
        'paidX86DebugTest'
      ]);

      const variant = resolveVariant(project, 'freeX86Debug', collaborators);
      expect(variant.getFlavorConfigs().map((flavor) => flavor.name)).toEqual(['free', 'x86']);
      expect(variant.getPackageName()).toBe('com.example.free');
      expect(variant.getVersionCode()).toBe(3);
      expect(variant.getResourceInputs()).toEqual([
        '/project/src/debug/res',
        '/project/src/free/res',
        '/project/src/x86/res',
        '/project/src/main/res',
        '/project/libs/core/res'
      ]);
    });

    it('should reject flavors outside the declared dimensions', () => {
      const data = projectData({
        flavorDimensions: ['tier'],
        productFlavors: { free: { dimension: 'tier' }, arm: {} }
      });

      expect(() => parseProject(data, ROOT)).toThrow("Flavor 'arm' must belong to one of the dimensions: tier");
    });

    it('should reject a dimension without flavors', () => {
      const data = projectData({
        flavorDimensions: ['tier', 'abi'],
        productFlavors: { free: { dimension: 'tier' } }
      });

      expect(() => parseProject(data, ROOT)).toThrow("Flavor dimension 'abi' has no flavors");
    });

    it('should name variants in camel case', () => {
      expect(variantName({ flavors: ['free', 'arm'], buildType: 'release' })).toBe('freeArmRelease');
    });
  });

  describe('createVariant', () => {
    it('should resolve a flavored application variant', () => {
      const project = parseProject(projectData(), ROOT);
      const variant = createVariant(project, { flavors: ['free'], buildType: 'debug' }, collaborators);

      expect(variant.getKind()).toBe('default');
      expect(variant.getPackageName()).toBe('com.example.free.debug');
      expect(variant.getVersionName()).toBe('1.0');
      expect(variant.getFlatDependencies().map((library) => library.name)).toEqual(['ui', 'core']);
      expect(variant.getResourceInputs()).toEqual([
        '/project/src/debug/res',
        '/project/src/free/res',
        '/project/src/main/res',
        '/project/libs/core/res'
      ]);
    });

    it('should fall back to the manifest package', () => {
      const project = parseProject(projectData(), ROOT);
      const variant = createVariant(project, { flavors: ['paid'], buildType: 'release' }, collaborators);

      expect(variant.getPackageName()).toBe('com.example');
    });

    it('should reject unknown flavors and build types', () => {
      const project = parseProject(projectData(), ROOT);

      expect(() => createVariant(project, { flavors: ['pro'], buildType: 'debug' }, collaborators))
        .toThrow("Flavor 'pro' is not configured");
      expect(() => createVariant(project, { flavors: [], buildType: 'staging' }, collaborators))
        .toThrow("Build type 'staging' is not configured");
    });

    it('should resolve jar paths against the project root', () => {
      const project = parseProject(projectData({ jars: [{ path: 'jars/util.jar', packaged: false }] }), ROOT);
      const variant = createVariant(project, { flavors: [], buildType: 'debug' }, collaborators);

      expect(variant.getJarDependencies()).toEqual([
        { path: '/project/jars/util.jar', compiled: true, packaged: false }
      ]);
    });

    it('should give a library variant its output artifact', () => {
      const project = parseProject(projectData({ type: 'library' }), ROOT);
      const variant = createVariant(project, { flavors: ['free'], buildType: 'debug' }, collaborators);

      expect(variant.getKind()).toBe('library');
      expect(variant.getOutputArtifact()?.jar).toBe('/project/build/outputs/freeDebug.jar');
      expect(variant.getOutputArtifact()?.resources).toBe('/project/src/main/res');
    });
  });

  describe('Test variants', () => {
    it('should test an application from the androidTest source sets', () => {
      const project = parseProject(projectData(), ROOT);
      const tested = createVariant(project, { flavors: ['free'], buildType: 'debug' }, collaborators);
      const test = createTestVariant(project, tested, collaborators);

      expect(test.getKind()).toBe('test');
      expect(test.getTestedConfig()).toBe(tested);
      expect(test.getPackageName()).toBe('com.example.free.debug.test');
      expect(test.getTestedPackageName()).toBe('com.example.free.debug');
      expect(test.getFlatDependencies()).toEqual([]);
      expect(test.getResourceInputs()).toEqual([
        '/project/src/androidTestFree/res',
        '/project/src/androidTest/res'
      ]);
    });

    it('should pull a tested library and its dependencies into the test', () => {
      const project = parseProject(projectData({ type: 'library' }), ROOT);
      const test = resolveVariant(project, 'freeDebugTest', collaborators);

      expect(test.getFlatDependencies().map((library) => library.name)).toEqual(['freeDebug', 'ui', 'core']);
      expect(test.getCompileClasspath().has('/project/build/outputs/freeDebug.jar')).toBe(true);
      expect(test.getTestedPackageName()).toBe(test.getPackageName());
    });

    it('should reject unknown variant names', () => {
      const project = parseProject(projectData(), ROOT);

      expect(() => resolveVariant(project, 'freeStaging', collaborators)).toThrow("Variant 'freeStaging' does not exist");
    });
  });

  describe('loadProject', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'variant-project-'));
    });

    afterEach(async () => {
      await fs.remove(testDir);
    });

    it('should fail when the file does not exist', async () => {
      await expect(loadProject(path.join(testDir, 'variant-config.json'))).rejects.toThrow('not found');
    });

    it('should fail on invalid JSON', async () => {
      const configPath = path.join(testDir, 'variant-config.json');
      await fs.writeFile(configPath, 'invalid json content');

      await expect(loadProject(configPath)).rejects.toThrow('Failed to read configuration');
    });

    it('should resolve paths against the directory of the file', async () => {
      const configPath = path.join(testDir, 'variant-config.json');
      await fs.writeJson(configPath, projectData());

      const project = await loadProject(configPath);

      expect(project.root).toBe(testDir);
      expect(project.libraries.get('core')?.jar).toBe(path.join(testDir, 'libs', 'core', 'core.jar'));
    });
  });
});
