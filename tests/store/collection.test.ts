import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/cli/errors.js';
import { Collection } from '../../src/store/collection.js';
import { TaskList } from '../../src/store/task-list.js';
import { makeTempDir, writeVtodo } from '../helpers/fixtures.js';

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir('todo-collection-');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('Collection.discover', () => {
  it('opens every matching directory and skips plain files', () => {
    writeVtodo(path.join(tempDir, 'work'), 'a.ics', { uid: 'a', summary: 'A' });
    fs.mkdirSync(path.join(tempDir, 'home'));
    fs.writeFileSync(path.join(tempDir, 'README'), 'ignored');

    const collection = Collection.discover(path.join(tempDir, '*'));
    expect(collection.names()).toEqual(['home', 'work']);
    expect(collection.get('work')?.todos.size).toBe(1);
    expect(collection.get('README')).toBeUndefined();
  });

  it('returns an empty collection when nothing matches', () => {
    const collection = Collection.discover(path.join(tempDir, 'nothing', '*'));
    expect(collection.size).toBe(0);
    expect(collection.values()).toEqual([]);
  });

  it('rejects two directories that resolve to the same list name', () => {
    fs.mkdirSync(path.join(tempDir, 'a', 'work'), { recursive: true });
    fs.mkdirSync(path.join(tempDir, 'b', 'work'), { recursive: true });

    expect(() => Collection.discover(path.join(tempDir, '*', 'work'))).toThrow(ConfigurationError);
    expect(() => Collection.discover(path.join(tempDir, '*', 'work'))).toThrow("Detected two lists named 'work'");
  });

  it('rejects adding the same directory twice', () => {
    fs.mkdirSync(path.join(tempDir, 'work'));
    const collection = new Collection();
    collection.add(TaskList.open(path.join(tempDir, 'work')));

    expect(() => collection.add(TaskList.open(`${path.join(tempDir, 'work')}/`))).toThrow(ConfigurationError);
    expect(collection.size).toBe(1);
  });

  it('keeps load warnings on the list that produced them', () => {
    const dir = path.join(tempDir, 'work');
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, 'bad.ics'), 'nothing here');

    const collection = Collection.discover(path.join(tempDir, '*'));
    expect(collection.get('work')?.warnings.map((w) => `${w.list}/${w.file}`)).toEqual(['work/bad.ics']);
  });
});
