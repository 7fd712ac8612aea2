/**
 * @arch hexgraph.test.unit
 */
/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({ name: z.string(), count: z.number().default(0) });

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('name: test\ncount: 2\n')).toEqual({ name: 'test', count: 2 });
  });

  it('should report syntax errors with their position', () => {
    try {
      parseYaml('name: [unclosed\n');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect(error instanceof SystemError && error.code).toBe(ErrorCodes.PARSE_ERROR);
      expect(error instanceof SystemError && typeof error.details?.line).toBe('number');
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: test\n', Schema)).toEqual({ name: 'test', count: 0 });
  });

  it('should describe schema failures by path', () => {
    expect(() => parseYamlWithSchema('name: 3\n', Schema)).toThrow(/^YAML validation failed: name: /);
  });

  it('should use the given error code', () => {
    try {
      parseYamlWithSchema('count: 1\n', Schema, ErrorCodes.INVALID_MANIFEST);
      expect.unreachable();
    } catch (error) {
      expect(error instanceof SystemError && error.code).toBe('S003');
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: loaded\n');

    await expect(loadYamlWithSchema('/p/file.yaml', Schema)).resolves.toEqual({ name: 'loaded', count: 0 });
  });

  it('should append the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('count: 1\n');

    await expect(loadYamlWithSchema('/p/file.yaml', Schema)).rejects.toThrow(/\(file: \/p\/file\.yaml\)$/);
  });

  it('should report unreadable files', async () => {
    mockReadFile.mockRejectedValue(new Error('EACCES'));

    await expect(loadYamlWithSchema('/p/file.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      details: { filePath: '/p/file.yaml', reason: 'EACCES' },
    });
  });
});
