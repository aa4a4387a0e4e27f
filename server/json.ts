import fs from 'fs';

export function readJsonFile(url: URL): unknown {
  return JSON.parse(fs.readFileSync(url, 'utf8')) as unknown;
}
