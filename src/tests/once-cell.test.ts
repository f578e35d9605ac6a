import test from 'node:test';
import assert from 'node:assert/strict';
import { OnceCell } from '../utils/once-cell.js';

test('OnceCell runs its factory only once', () => {
  const cell = new OnceCell<{ id: number }>();
  let calls = 0;

  const first = cell.getOrInit(() => ({ id: ++calls }));
  const second = cell.getOrInit(() => ({ id: ++calls }));

  assert.equal(calls, 1);
  assert.equal(first, second);
  assert.deepStrictEqual(cell.get(), { id: 1 });
});

test('OnceCell reports empty until initialised', () => {
  const cell = new OnceCell<number>();
  assert.equal(cell.isInitialized(), false);
  assert.equal(cell.get(), undefined);

  cell.getOrInit(() => 0);
  assert.equal(cell.isInitialized(), true);
  assert.equal(cell.get(), 0);
});

test('OnceCell keeps the value set re-entrantly by its own factory', () => {
  const cell = new OnceCell<string>();

  const result = cell.getOrInit(() => {
    cell.getOrInit(() => 'inner');
    return 'outer';
  });

  assert.equal(result, 'inner');
  assert.equal(cell.get(), 'inner');
});

test('OnceCell take empties the cell so the next init runs again', () => {
  const cell = new OnceCell<string>();
  cell.getOrInit(() => 'a');

  assert.equal(cell.take(), 'a');
  assert.equal(cell.isInitialized(), false);
  assert.equal(cell.take(), undefined);
  assert.equal(cell.getOrInit(() => 'b'), 'b');
});
