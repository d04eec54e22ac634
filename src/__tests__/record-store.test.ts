import { describe, expect, test, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  appendRecord,
  loadExistingIds,
  readAll,
  readUnique,
  repairTail,
  writeAll,
} from '../store/record-store.js';
import { BufferedRecordSink, JsonlRecordSink } from '../store/record-sink.js';
import { ExampleSchema, GenerationSchema, JudgedRecordSchema, type JudgedRecord } from '../config/schemas.js';
import { InputFileError, SchemaError } from '../errors.js';
import { createExample, toJsonl } from './fixtures.js';

function judged(id: string, score: 0 | 1 = 1): JudgedRecord {
  return {
    example_id: id,
    category: 'normal',
    prompt: 'p',
    reference: 'r',
    generation: 'g',
    score,
    explanation: 'e',
  };
}

describe('record store', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'record-store-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('readAll', () => {
    test('parses each line and skips blank lines', async () => {
      const file = path.join(tempDir, 'dataset.jsonl');
      await fs.writeFile(
        file,
        `${JSON.stringify(createExample('e1'))}\n\n   \n${JSON.stringify(createExample('e2', 'hard'))}\n`
      );

      const examples = await readAll(file, ExampleSchema);

      expect(examples.map((e) => [e.example_id, e.category])).toEqual([
        ['e1', 'normal'],
        ['e2', 'hard'],
      ]);
    });

    test('handles CRLF line endings', async () => {
      const file = path.join(tempDir, 'generations.jsonl');
      await fs.writeFile(file, '{"example_id":"e1","generation":"a"}\r\n{"example_id":"e2","generation":"b"}\r\n');

      const generations = await readAll(file, GenerationSchema);

      expect(generations).toEqual([
        { example_id: 'e1', generation: 'a' },
        { example_id: 'e2', generation: 'b' },
      ]);
    });

    test('throws SchemaError with the line number of a bad record', async () => {
      const file = path.join(tempDir, 'dataset.jsonl');
      await fs.writeFile(file, toJsonl([createExample('e1'), { ...createExample('e2'), category: 'easy' }]));

      const error = await readAll(file, ExampleSchema).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SchemaError);
      expect(error).toMatchObject({ filePath: file, line: 2 });
    });

    test('throws SchemaError for a line that is not JSON', async () => {
      const file = path.join(tempDir, 'generations.jsonl');
      await fs.writeFile(file, '{"example_id":"e1","generation":"a"}\n{"example_id":\n');

      await expect(readAll(file, GenerationSchema)).rejects.toMatchObject({ type: 'schema', line: 2 });
    });

    test('throws InputFileError for a missing file', async () => {
      await expect(readAll(path.join(tempDir, 'nope.jsonl'), GenerationSchema)).rejects.toBeInstanceOf(
        InputFileError
      );
    });
  });

  describe('readUnique', () => {
    test('rejects duplicate ids', async () => {
      const file = path.join(tempDir, 'generations.jsonl');
      await fs.writeFile(
        file,
        toJsonl([
          { example_id: 'e1', generation: 'a' },
          { example_id: 'e1', generation: 'b' },
        ])
      );

      await expect(readUnique(file, GenerationSchema)).rejects.toThrow(`${file}: duplicate example_id "e1"`);
    });
  });

  describe('appendRecord', () => {
    test('writes exactly one line per record', async () => {
      const file = path.join(tempDir, 'judged.jsonl');

      await appendRecord(file, judged('e1'));
      await appendRecord(file, judged('e2', 0));

      const content = await fs.readFile(file, 'utf-8');
      expect(content.split('\n')).toEqual([JSON.stringify(judged('e1')), JSON.stringify(judged('e2', 0)), '']);
    });
  });

  describe('writeAll', () => {
    test('replaces the file and creates parent directories', async () => {
      const file = path.join(tempDir, 'nested', 'out.jsonl');
      await writeAll(file, [judged('old')]);

      await writeAll(file, [judged('e1'), judged('e2')]);

      const records = await readAll(file, JudgedRecordSchema);
      expect(records.map((r) => r.example_id)).toEqual(['e1', 'e2']);
      expect(await fs.readdir(path.dirname(file))).toEqual(['out.jsonl']);
    });
  });

  describe('loadExistingIds', () => {
    test('returns an empty set when the file does not exist', async () => {
      const ids = await loadExistingIds(path.join(tempDir, 'missing.jsonl'));
      expect(ids.size).toBe(0);
    });

    test('collects ids under any accepted key', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      await fs.writeFile(file, toJsonl([judged('e1'), { id: 'e2', score: 1 }, { exampleId: 'e3' }]));

      const ids = await loadExistingIds(file);

      expect(Array.from(ids)).toEqual(['e1', 'e2', 'e3']);
    });

    test('rejects a line without an id', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      await fs.writeFile(file, toJsonl([judged('e1'), { score: 1 }]));

      await expect(loadExistingIds(file)).rejects.toBeInstanceOf(SchemaError);
    });

    test('ignores a partial last line', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      await fs.writeFile(file, `${JSON.stringify(judged('e1'))}\n{"example_id":"e2","categ`);

      expect(Array.from(await loadExistingIds(file))).toEqual(['e1']);
    });

    test('counts a complete last line without a newline', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      await fs.writeFile(file, `${JSON.stringify(judged('e1'))}\n${JSON.stringify(judged('e2'))}`);

      expect(Array.from(await loadExistingIds(file))).toEqual(['e1', 'e2']);
    });

    test('rejects a bad line followed by a good one', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      await fs.writeFile(file, `{"example_id":"e1","categ\n${JSON.stringify(judged('e2'))}\n`);

      await expect(loadExistingIds(file)).rejects.toMatchObject({ type: 'schema', line: 1 });
    });
  });

  describe('repairTail', () => {
    test('cuts a partial last line back to the previous newline', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      const kept = `${JSON.stringify(judged('e1'))}\n`;
      await fs.writeFile(file, `${kept}{"example_id":"e2","categ`);

      expect(await repairTail(file)).toBe(true);
      expect(await fs.readFile(file, 'utf-8')).toBe(kept);
    });

    test('terminates a complete last line', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      const line = JSON.stringify(judged('e1'));
      await fs.writeFile(file, line);

      expect(await repairTail(file)).toBe(false);
      expect(await fs.readFile(file, 'utf-8')).toBe(`${line}\n`);
    });

    test('leaves clean and missing files alone', async () => {
      const file = path.join(tempDir, 'judged.jsonl');
      await fs.writeFile(file, toJsonl([judged('e1')]));

      expect(await repairTail(file)).toBe(false);
      expect(await fs.readFile(file, 'utf-8')).toBe(toJsonl([judged('e1')]));
      expect(await repairTail(path.join(tempDir, 'missing.jsonl'))).toBe(false);
    });
  });
});

describe('record sinks', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'record-sink-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('JsonlRecordSink serialises concurrent appends', async () => {
    const file = path.join(tempDir, 'judged.jsonl');
    const sink = new JsonlRecordSink(file);
    const ids = Array.from({ length: 20 }, (_, i) => `e${i}`);

    await Promise.all(ids.map((id) => sink.append(judged(id))));
    await sink.close();

    const records = await readAll(file, JudgedRecordSchema);
    expect(records.map((r) => r.example_id)).toEqual(ids);
    expect(sink.count).toBe(20);
  });

  test('BufferedRecordSink writes nothing until closed', async () => {
    const file = path.join(tempDir, 'judged.jsonl');
    await fs.writeFile(file, toJsonl([judged('e0')]));
    const sink = new BufferedRecordSink(file, 'append');

    await sink.append(judged('e1'));
    expect((await readAll(file, JudgedRecordSchema)).map((r) => r.example_id)).toEqual(['e0']);

    await sink.close();
    expect((await readAll(file, JudgedRecordSchema)).map((r) => r.example_id)).toEqual(['e0', 'e1']);
  });
});
