import { readFileSync } from 'fs';

function readManifestVersion(): string | undefined {
  let raw: string;
  try {
    raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  } catch {
    return undefined;
  }

  const manifest: unknown = JSON.parse(raw);
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return undefined;
}

/**
 * Version precedence: TCT_VERSION (set by release builds), then the
 * package manifest, then "dev".
 */
export function getVersion(env: Record<string, string | undefined> = process.env): string {
  const injected = env.TCT_VERSION;
  if (injected && injected !== 'dev') {
    return injected;
  }

  return readManifestVersion() ?? 'dev';
}
