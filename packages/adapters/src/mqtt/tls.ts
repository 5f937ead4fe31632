import { existsSync, readFileSync } from 'node:fs';

/** Reads the broker CA bundle for `mqtts://` URLs; warns when the file is missing. */
export function loadCaBundle(url: string, caPath: string | undefined, component: string): Buffer | undefined {
  if (!url.startsWith('mqtts://') || !caPath) return undefined;
  if (!existsSync(caPath)) {
    console.warn(`[${component}] WARNING: CA path set but file not found: ${caPath}`);
    return undefined;
  }
  return readFileSync(caPath);
}
