import test from 'node:test';
import assert from 'node:assert/strict';
import { FifoQueue } from '../utils/fifo-queue.js';

test('FifoQueue pops in insertion order', () => {
  const queue = new FifoQueue<string>();
  queue.push('a');
  queue.push('b');
  queue.push('c');

  assert.equal(queue.length, 3);
  assert.equal(queue.shift(), 'a');
  assert.equal(queue.shift(), 'b');
  assert.equal(queue.shift(), 'c');
  assert.equal(queue.shift(), undefined);
  assert.equal(queue.isEmpty(), true);
});

test('FifoQueue pushFront jumps the line', () => {
  const queue = new FifoQueue<number>(2);
  queue.push(1);
  queue.push(2);
  queue.pushFront(0);

  assert.equal(queue.peek(), 0);
  assert.deepStrictEqual(queue.toArray(), [0, 1, 2]);
});

test('FifoQueue grows past its initial capacity after wrapping around', () => {
  const queue = new FifoQueue<number>(4);
  for (let i = 0; i < 3; i++) queue.push(i);
  queue.shift();
  queue.shift();
  // head now sits mid-buffer, so the next pushes wrap
  for (let i = 3; i < 10; i++) queue.push(i);

  assert.equal(queue.length, 8);
  assert.deepStrictEqual(queue.toArray(), [2, 3, 4, 5, 6, 7, 8, 9]);
});

test('FifoQueue clear drops everything', () => {
  const queue = new FifoQueue<string>();
  queue.push('x');
  queue.clear();

  assert.equal(queue.length, 0);
  assert.equal(queue.peek(), undefined);
});

test('FifoQueue rejects a non-positive capacity', () => {
  assert.throws(() => new FifoQueue<number>(0), /positive integer capacity/);
});
