import { createRequire } from 'node:module';

declare const __WORKTRACK_VERSION__: string | undefined;

const injectedVersion = typeof __WORKTRACK_VERSION__ === 'string'
  ? __WORKTRACK_VERSION__
  : null;

let packageVersion: string | null = null;
if (!injectedVersion) {
  const require = createRequire(import.meta.url);
  const packageJson = require('../package.json') as { version?: unknown };
  packageVersion = typeof packageJson.version === 'string' && packageJson.version.length > 0
    ? packageJson.version
    : null;
}

const resolvedVersion = injectedVersion ?? packageVersion;

if (!resolvedVersion) {
  throw new Error('Unable to determine worktrack version.');
}

export const WORKTRACK_VERSION = resolvedVersion;
