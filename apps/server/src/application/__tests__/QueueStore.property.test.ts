/**
 * Property-based tests for QueueStore
 */

import * as fc from 'fast-check';
import { QueueStore } from '../QueueStore';
import { RecordingPublisher, submitReady } from '../../__tests__/setup/player-fakes';

type Op =
  | { kind: 'submit' }
  | { kind: 'remove'; at: number }
  | { kind: 'take'; at: number }
  | { kind: 'move'; from: number; to: number }
  | { kind: 'front'; at: number }
  | { kind: 'shuffle' };

const opArb: fc.Arbitrary<Op> = fc.oneof(
  fc.constant<Op>({ kind: 'submit' }),
  fc.nat(20).map<Op>((at) => ({ kind: 'remove', at })),
  fc.nat(20).map<Op>((at) => ({ kind: 'take', at })),
  fc.tuple(fc.nat(20), fc.nat(20)).map<Op>(([from, to]) => ({ kind: 'move', from, to })),
  fc.nat(20).map<Op>((at) => ({ kind: 'front', at })),
  fc.constant<Op>({ kind: 'shuffle' })
);

describe('QueueStore Property Tests', () => {
  /**
   * Ids stay unique, the cursor stays within [0, size] and every mutation publishes
   * exactly one event, whatever sequence of operations runs
   */
  test('queue invariants hold under arbitrary operation sequences', () => {
    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 60 }), fc.double({ min: 0, max: 0.999, noNaN: true }), (ops, seed) => {
        const publisher = new RecordingPublisher();
        const queue = new QueueStore(publisher, () => seed);
        submitReady(queue, 'seed-1', 'seed-2');

        for (const op of ops) {
          const items = queue.getItems();
          const before = publisher.events.length;
          const pick = (at: number) => items[at % Math.max(items.length, 1)];

          switch (op.kind) {
            case 'submit':
              queue.submit(`https://example.test/watch?v=${before}`);
              expect(publisher.events.length).toBe(before + 1);
              break;
            case 'remove': {
              const target = pick(op.at);
              if (target) {
                expect(queue.removeAt(target.id).success).toBe(true);
                expect(publisher.events.length).toBe(before + 1);
              }
              break;
            }
            case 'take': {
              const target = pick(op.at);
              if (target) {
                const index = items.indexOf(target);
                queue.takeForPlayback(target.id);
                expect(queue.getPlayCursor()).toBe(index);
              }
              break;
            }
            case 'move': {
              const result = queue.moveTo(op.from, op.to);
              const valid = op.from < items.length && op.to < items.length;
              expect(result.success).toBe(valid);
              expect(publisher.events.length).toBe(before + (valid ? 1 : 0));
              break;
            }
            case 'front': {
              const target = pick(op.at);
              if (target) {
                queue.moveToFront(target.id);
                expect(queue.getItems()[0].id).toBe(target.id);
              }
              break;
            }
            case 'shuffle':
              queue.shuffleExceptLeading();
              expect(queue.size()).toBe(items.length);
              break;
          }

          const ids = queue.getItems().map((item) => item.id);
          expect(new Set(ids).size).toBe(ids.length);
          expect(queue.getPlayCursor()).toBeGreaterThanOrEqual(0);
          expect(queue.getPlayCursor()).toBeLessThanOrEqual(queue.size());
        }
      })
    );
  });

  /**
   * moveTo is a permutation that lands the moved item at the target index
   */
  test('moveTo preserves membership and places the item', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 12 }), fc.nat(), fc.nat(), (size, rawFrom, rawTo) => {
        const queue = new QueueStore(new RecordingPublisher());
        const titles = Array.from({ length: size }, (_, i) => `T${i}`);
        submitReady(queue, ...titles);
        const from = rawFrom % size;
        const to = rawTo % size;
        const moved = queue.getItems()[from];

        expect(queue.moveTo(from, to).success).toBe(true);

        const after = queue.getItems();
        expect(after[to].id).toBe(moved.id);
        expect(after.map((item) => item.resolved?.title).sort()).toEqual([...titles].sort());
      })
    );
  });

  /**
   * Shuffle keeps every item and pins the protected one at the head
   */
  test('shuffle is a permutation that keeps the protected item first', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 12 }),
        fc.nat(),
        fc.array(fc.double({ min: 0, max: 0.999, noNaN: true }), { minLength: 1, maxLength: 12 }),
        (size, rawProtected, randoms) => {
          let call = 0;
          const queue = new QueueStore(new RecordingPublisher(), () => randoms[call++ % randoms.length]);
          const items = submitReady(queue, ...Array.from({ length: size }, (_, i) => `T${i}`));
          const protectedItem = items[rawProtected % size];

          queue.shuffleExceptLeading(protectedItem.id);

          const after = queue.getItems();
          expect(after[0].id).toBe(protectedItem.id);
          expect(after.map((item) => item.id).sort()).toEqual(items.map((item) => item.id).sort());
          expect(queue.getPlayCursor()).toBe(0);
        }
      )
    );
  });
});
