import * as fs from 'fs-extra';
import { XMLParser } from 'fast-xml-parser';
import { FileChecker, ManifestReader } from './types';
import { UnresolvedPackageNameError, errorMessage } from './errors';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_'
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the `package` attribute of the root `<manifest>` element.
 */
export class XmlManifestReader implements ManifestReader {
  getPackage(manifestPath: string): string {
    let content: string;
    try {
      content = fs.readFileSync(manifestPath, 'utf8');
    } catch (error) {
      throw new UnresolvedPackageNameError(manifestPath, errorMessage(error));
    }

    let parsed: unknown;
    try {
      parsed = parser.parse(content, true);
    } catch (error) {
      throw new UnresolvedPackageNameError(manifestPath, errorMessage(error));
    }

    const manifest = isRecord(parsed) ? parsed['manifest'] : undefined;
    if (!isRecord(manifest)) {
      throw new UnresolvedPackageNameError(manifestPath, 'no <manifest> element');
    }

    const packageName = manifest['@_package'];
    if (typeof packageName !== 'string' || packageName.trim().length === 0) {
      throw new UnresolvedPackageNameError(manifestPath, 'no package attribute');
    }
    return packageName.trim();
  }
}

export const defaultFileChecker: FileChecker = {
  isFile(filePath: string): boolean {
    return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
  }
};
