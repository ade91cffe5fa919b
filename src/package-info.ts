import fs from 'fs';
import path from 'path';

interface PackageInfo {
  name: string;
  version: string;
  description?: string;
}

const FALLBACK: PackageInfo = {
  name: 'openapi-tool-bridge',
  version: '1.0.0',
  description: 'Expose OpenAPI operations as MCP tools'
};

let packageInfo: PackageInfo | null = null;

/**
 * Reads and caches package.json information
 */
function loadPackageInfo(): PackageInfo {
  if (packageInfo) {
    return packageInfo;
  }

  // Sources run from src/, the build from dist/src/
  const candidates = [
    path.resolve(__dirname, '..', 'package.json'),
    path.resolve(__dirname, '..', '..', 'package.json')
  ];
  const packageJsonPath = candidates.find(candidate => fs.existsSync(candidate));

  if (!packageJsonPath) {
    packageInfo = FALLBACK;
    return packageInfo;
  }

  const packageJson: Partial<PackageInfo> = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  packageInfo = {
    name: packageJson.name ?? FALLBACK.name,
    version: packageJson.version ?? FALLBACK.version,
    description: packageJson.description
  };
  return packageInfo;
}

export const PACKAGE_NAME = loadPackageInfo().name;
export const PACKAGE_VERSION = loadPackageInfo().version;

export function getPackageInfo(): PackageInfo {
  return loadPackageInfo();
}
