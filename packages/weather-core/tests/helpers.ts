import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { strToU8, zipSync } from 'fflate';

export const FULL_HEADER = 'valid_time,latitude,longitude,t2m,d2m,tp,ssrd,strd,sp,snowc,u10,v10';

export const FULL_CSV = [
  FULL_HEADER,
  '2000-01-01T00:00:00,57.7,11.97,300.15,280.15,0.1,1.0,2.0,101325,0.0,3.0,4.0'
].join('\n');

export async function makeTempDir(prefix = 'weather-core-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeZip(filePath: string, members: Record<string, string>): Promise<string> {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, contents] of Object.entries(members)) {
    entries[name] = strToU8(contents);
  }
  await writeFile(filePath, zipSync(entries));
  return filePath;
}
