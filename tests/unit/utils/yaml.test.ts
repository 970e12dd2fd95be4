/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { loadYamlWithSchema, writeYaml } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('loadYamlWithSchema / writeYaml', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qa-yaml-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read back what it wrote', async () => {
    const file = path.join(dir, 'nested', 'config.yaml');
    await writeYaml(file, { name: 'kb', count: 3 });

    expect(await loadYamlWithSchema(file, Schema)).toEqual({ name: 'kb', count: 3 });
  });

  it('should apply schema defaults', async () => {
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, 'name: kb\n');

    expect(await loadYamlWithSchema(file, Schema)).toEqual({ name: 'kb', count: 1 });
  });

  it('should report syntax errors with the file', async () => {
    const file = path.join(dir, 'broken.yaml');
    fs.writeFileSync(file, 'a: [1, 2');

    await expect(loadYamlWithSchema(file, Schema)).rejects.toMatchObject({
      code: ErrorCodes.PARSE_ERROR,
      details: { filePath: file },
    });
    await expect(loadYamlWithSchema(file, Schema)).rejects.toThrow('Failed to parse YAML:');
  });

  it('should report the failing path with the file', async () => {
    const file = path.join(dir, 'invalid.yaml');
    fs.writeFileSync(file, 'count: 2\n');

    let caught: unknown;
    try {
      await loadYamlWithSchema(file, Schema);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: ErrorCodes.PARSE_ERROR,
      message: expect.stringContaining('YAML validation failed: name:'),
      details: { filePath: file },
    });
  });

  it('should write block style', async () => {
    const file = path.join(dir, 'out.yaml');
    await writeYaml(file, { storage: { db_dir: 'db' } });

    expect(fs.readFileSync(file, 'utf-8')).toBe('storage:\n  db_dir: db\n');
  });

  it('should name the file when loading fails', async () => {
    const file = path.join(dir, 'missing.yaml');

    await expect(loadYamlWithSchema(file, Schema)).rejects.toThrow(`Failed to load YAML file: ${file}`);
  });
});
