import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { enrichArgsSchema, runEnrichAction } from './enrich.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-enrich-action');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('runEnrichAction', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('exits with 1 when the log file cannot be created', async () => {
    const blocker = join(TEST_DIR, 'not-a-directory');
    writeFileSync(blocker, 'plain file');

    const args = enrichArgsSchema.parse({
      inputDir: join(TEST_DIR, 'input'),
      outputDir: join(TEST_DIR, 'output'),
      logDir: join(blocker, 'logs'),
      logLevel: 'silent',
    });

    await expect(runEnrichAction(args)).resolves.toBe(1);
    expect(existsSync(join(TEST_DIR, 'output'))).toBe(false);
  });
});
