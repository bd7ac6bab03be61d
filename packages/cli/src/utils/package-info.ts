import { readFileSync } from 'node:fs';
import { object, parse, string } from 'valibot';

const packageJsonSchema = object({
  name: string(),
  version: string(),
});

export function readPackageVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf8'),
  );
  return parse(packageJsonSchema, raw).version;
}
