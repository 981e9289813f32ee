import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { convertCommand } from '../convert.js';
import { captureOutput, minimalDescription } from './helpers.js';

describe('convert command', () => {
  let testDir: string;
  let output: ReturnType<typeof captureOutput>;
  let writeSpy: MockInstance<typeof process.stdout.write>;

  const written = () => writeSpy.mock.calls.map(([chunk]) => String(chunk)).join('');

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'arazzo-convert-test-'));
    output = captureOutput();
    writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    writeSpy.mockRestore();
    output.restore();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should convert JSON to YAML by default', async () => {
    const file = join(testDir, 'pets.arazzo.json');
    writeFileSync(file, JSON.stringify(minimalDescription));

    await convertCommand(file);

    expect(written().split('\n')[0]).toBe('arazzo: 1.0.1');
    expect(parseYaml(written())).toEqual(minimalDescription);
  });

  it('should convert YAML to JSON', async () => {
    const file = join(testDir, 'pets.arazzo.yaml');
    writeFileSync(file, JSON.stringify(minimalDescription));

    await convertCommand(file, { format: 'json' });

    expect(JSON.parse(written())).toEqual(minimalDescription);
  });

  it('should drop unknown keys and keep extensions', async () => {
    const file = join(testDir, 'pets.arazzo.json');
    writeFileSync(
      file,
      JSON.stringify({ ...minimalDescription, bogus: 1, 'x-foo': 1 })
    );

    await convertCommand(file, { format: 'json' });

    const converted = JSON.parse(written());
    expect(converted.bogus).toBeUndefined();
    expect(converted['x-foo']).toBe(1);
  });

  it('should exit with 1 on invalid descriptions', async () => {
    const file = join(testDir, 'pets.arazzo.json');
    writeFileSync(file, JSON.stringify({ ...minimalDescription, workflows: [] }));

    await expect(convertCommand(file)).rejects.toThrow('process.exit(1)');
    expect(output.stderr[0]).toBe(
      '✗ Invalid value for "workflows": must contain at least one entry (at workflows)'
    );
    expect(writeSpy).not.toHaveBeenCalled();
  });
});
