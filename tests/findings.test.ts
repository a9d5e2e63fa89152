/**
 * Findings Parser Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  CompilerOutputParser,
  createCompilerOutputParser,
  loadFindingsFile,
  groupFindings,
  countFindings,
} from '../src/lib/findings/index.js';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { finding } from './fixtures.js';

const TEST_FINDINGS_DIR = './test-findings';

const BUILD_OUTPUT = [
  '[INFO] Compiling 12 source files to /work/proj/target/classes',
  '[WARNING] /work/proj/main/src/Foo.java:[10,5] [NullAway] x may be null',
  '    (see https://docs.example/NullAway)',
  '[WARNING] /work/proj/main/src/Bar.java:[20,9] [ReferenceEquality] Comparison using reference equality',
  '    (see https://docs.example/ReferenceEquality)',
  "  Did you mean 'a.equals(b)'?",
  '[WARNING] /work/proj/main/src/Foo.java:[10,5] [NullAway] x may be null',
  '    (see https://docs.example/NullAway)',
  '[WARNING] /work/proj/main/src/Baz.java:[3,1] [NullAway] y may be null',
  '[WARNING] /work/proj/main/src/Old.java:[1,1] deprecation warning without a type',
  '[ERROR] /elsewhere/Qux.java:[7,2] [MissingOverride] add @Override',
].join('\n');

describe('CompilerOutputParser', () => {
  const parser = createCompilerOutputParser({ rootDir: '/work/proj' });

  it('should group findings by type in first-seen order', () => {
    const data = parser.parse(BUILD_OUTPUT);

    expect([...data.keys()]).toEqual(['NullAway', 'ReferenceEquality', 'MissingOverride']);
    expect(countFindings(data)).toBe(4);
  });

  it('should read location, severity and message', () => {
    const [first] = parser.parse(BUILD_OUTPUT).get('NullAway') ?? [];

    expect(first).toEqual({
      path: 'main/src/Foo.java',
      line: 10,
      column: 5,
      severity: 'WARNING',
      type: 'NullAway',
      message: 'x may be null',
      extra: null,
      url: 'https://docs.example/NullAway',
    });
  });

  it('should attach documentation links and hints', () => {
    const [equality] = parser.parse(BUILD_OUTPUT).get('ReferenceEquality') ?? [];

    expect(equality?.url).toBe('https://docs.example/ReferenceEquality');
    expect(equality?.extra).toBe("Did you mean 'a.equals(b)'?");
  });

  it('should drop repeated diagnostics', () => {
    const paths = (parser.parse(BUILD_OUTPUT).get('NullAway') ?? []).map(f => f.path);
    expect(paths).toEqual(['main/src/Foo.java', 'main/src/Baz.java']);
  });

  it('should keep repeated diagnostics when asked', () => {
    const keepAll = new CompilerOutputParser({ rootDir: '/work/proj', dedupe: false });
    expect(keepAll.parse(BUILD_OUTPUT).get('NullAway')).toHaveLength(3);
  });

  it('should keep paths outside the root as they are', () => {
    const [override] = parser.parse(BUILD_OUTPUT).get('MissingOverride') ?? [];

    expect(override?.path).toBe('/elsewhere/Qux.java');
    expect(override?.severity).toBe('ERROR');
    expect(override?.message).toBe('add @Override');
  });

  it('should join multi-line hints and handle CRLF output', () => {
    const output = [
      '[WARNING] /work/proj/A.java:[1,2] [UnusedVariable] The local variable x is never read',
      '  first hint',
      '  second hint',
      '',
      '  not a hint',
    ].join('\r\n');

    const [unused] = parser.parse(output).get('UnusedVariable') ?? [];
    expect(unused?.path).toBe('A.java');
    expect(unused?.extra).toBe('first hint\nsecond hint');
  });

  it('should return an empty map for output without diagnostics', () => {
    expect(parser.parse('[INFO] BUILD SUCCESS\n').size).toBe(0);
  });
});

describe('groupFindings', () => {
  it('should keep first-seen order', () => {
    const data = groupFindings([
      finding({ type: 'B' }),
      finding({ type: 'A', line: 1 }),
      finding({ type: 'B', line: 2 }),
    ]);

    expect([...data.keys()]).toEqual(['B', 'A']);
    expect(data.get('B')?.map(f => f.line)).toEqual([10, 2]);
  });
});

describe('loadFindingsFile', () => {
  beforeAll(async () => {
    await mkdir(TEST_FINDINGS_DIR, { recursive: true });
  });

  afterAll(async () => {
    await rm(TEST_FINDINGS_DIR, { recursive: true, force: true });
  });

  it('should group a flat list', async () => {
    const path = join(TEST_FINDINGS_DIR, 'flat.json');
    await writeFile(path, JSON.stringify([
      finding({ type: 'A' }),
      finding({ type: 'B' }),
      finding({ type: 'A', line: 11 }),
    ]));

    const data = await loadFindingsFile(path);
    expect([...data.keys()]).toEqual(['A', 'B']);
    expect(data.get('A')).toHaveLength(2);
  });

  it('should fill in the type from the key of a mapping', async () => {
    const path = join(TEST_FINDINGS_DIR, 'keyed.json');
    await writeFile(path, JSON.stringify({
      NullAway: [{ path: 'Foo.java', line: 10, column: 5, severity: 'ERROR', message: 'x may be null', extra: null }],
    }));

    const data = await loadFindingsFile(path);
    expect(data.get('NullAway')?.[0]?.type).toBe('NullAway');
    expect(data.get('NullAway')?.[0]?.extra).toBeNull();
  });

  it('should reject invalid findings', async () => {
    const path = join(TEST_FINDINGS_DIR, 'invalid.json');
    await writeFile(path, JSON.stringify([{ ...finding(), line: 0 }]));

    await expect(loadFindingsFile(path)).rejects.toThrow();
  });
});
