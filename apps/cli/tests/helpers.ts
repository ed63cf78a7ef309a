import { mkdtemp, writeFile } from 'node:fs/promises';
import http from 'node:http';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { strToU8, zipSync } from 'fflate';
import pino from 'pino';

import type { CdsRequest, DatasetRetriever } from '../src/lib/cdsClient';

export const silentLogger = pino({ level: 'silent' });

export async function createTempDir(prefix = 'weather-cli-test-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  return dir;
}

export function sampleCsv(latitude = 57.7, longitude = 11.97): string {
  return [
    'valid_time,latitude,longitude,t2m,d2m,tp,ssrd,strd,sp,snowc,u10,v10',
    `2020-01-01 00:00:00,${latitude},${longitude},300.15,280.15,0.1,1.0,2.0,101325,0.0,3.0,4.0`,
    `2020-01-01 01:00:00,${latitude},${longitude},301.15,281.15,0.0,5.0,2.5,101300,0.0,0.0,2.0`
  ].join('\n');
}

export function zipArchive(csv: string): Uint8Array {
  return zipSync({ 'data.csv': strToU8(csv) });
}

export async function writeArchive(filePath: string, csv = sampleCsv()): Promise<string> {
  await writeFile(filePath, zipArchive(csv));
  return filePath;
}

export function createRecorder(): { lines: string[]; print: (line: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    print: (line: string) => {
      lines.push(line);
    }
  };
}

export class StubRetriever implements DatasetRetriever {
  readonly calls: Array<{ dataset: string; request: CdsRequest; targetPath: string }> = [];

  constructor(private readonly content: Uint8Array = zipArchive(sampleCsv())) {}

  async retrieve(dataset: string, request: CdsRequest, targetPath: string): Promise<string> {
    this.calls.push({ dataset, request, targetPath });
    await writeFile(targetPath, this.content);
    return targetPath;
  }
}

export type RecordedRequest = {
  method: string | undefined;
  url: string | undefined;
  headers: http.IncomingHttpHeaders;
  body: unknown;
};

export async function startMockServer(
  handler: (req: http.IncomingMessage, body: unknown, res: http.ServerResponse) => void
): Promise<{
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}> {
  const requests: RecordedRequest[] = [];

  const server = http.createServer((req, res) => {
    let raw = '';
    req.setEncoding('utf8');
    req.on('data', (chunk) => {
      raw += chunk;
    });
    req.on('end', () => {
      let parsed: unknown = undefined;
      if (raw.length > 0) {
        try {
          parsed = JSON.parse(raw);
        } catch {
          parsed = raw;
        }
      }
      requests.push({ method: req.method, url: req.url, headers: req.headers, body: parsed });
      handler(req, parsed, res);
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.on('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('mock server did not bind to a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    async close() {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    }
  };
}

export function sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(payload));
}
