import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

// index.ts starts the service on import, so its import order is checked from source
const entrypoint = readFileSync(fileURLToPath(new URL('../index.ts', import.meta.url)), 'utf8');

describe('process entry point', () => {
  it('loads .env before any module that reads the environment', () => {
    const imports = entrypoint.split('\n').filter(line => line.startsWith('import '));

    expect(imports[0]).toBe("import 'dotenv/config';");
  });
});
