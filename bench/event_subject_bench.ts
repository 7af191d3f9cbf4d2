// event_subject_bench.ts
//
// Throughput of the relay: live push, buffered replay, handover and pull mode.
// Run with `npm run bench`.
//

import { bench, group, summary, run, do_not_optimize } from "mitata";

import type { ConsumerHandle } from "../_types.ts";
import { EventSubject } from "../event_subject.ts";
import { clear, createQueue, dequeue, enqueue } from "../queue.ts";

const N = 1_000;

// Helper to prevent optimizations
const blackhole = (x: unknown) => do_not_optimize(x);

/*====================================================================
  QUEUE
====================================================================*/
summary(() => {
  group("queue", () => {
    bench("array push/shift", () => {
      const items: number[] = [];
      for (let i = 0; i < N; i++) items.push(i);
      let sum = 0;
      for (let v = items.shift(); v !== undefined; v = items.shift()) sum += v;
      blackhole(sum);
    }).baseline(true);

    bench("ring buffer (hint 16)", () => {
      const queue = createQueue<number>(16);
      for (let i = 0; i < N; i++) enqueue(queue, i);
      let sum = 0;
      for (let v = dequeue(queue); v !== undefined; v = dequeue(queue)) sum += v;
      blackhole(sum);
    });

    const reused = createQueue<number>(N);
    bench("ring buffer (presized, reused)", () => {
      clear(reused);
      for (let i = 0; i < N; i++) enqueue(reused, i);
      let sum = 0;
      for (let v = dequeue(reused); v !== undefined; v = dequeue(reused)) sum += v;
      blackhole(sum);
    });
  });
});

/*====================================================================
  RELAY
====================================================================*/
summary(() => {
  group("relay 1k values", () => {
    bench("live push", () => {
      const subject = EventSubject.create<number>();
      let sum = 0;
      subject.subscribe(v => { sum += v; });
      for (let i = 0; i < N; i++) subject.next(i);
      subject.complete();
      blackhole(sum);
    }).baseline(true);

    bench("buffered replay", () => {
      const subject = EventSubject.create<number>();
      for (let i = 0; i < N; i++) subject.next(i);
      let sum = 0;
      subject.subscribe(v => { sum += v; });
      subject.complete();
      blackhole(sum);
    });

    bench("pull mode", () => {
      const subject = EventSubject.create<number>();
      let sum = 0;
      let handle: ConsumerHandle<number> | undefined;
      subject.subscribe({
        start(h) {
          handle = h;
          h.requestFusion();
        },
        ready() {
          for (let v = handle?.poll(); v !== undefined; v = handle?.poll()) sum += v;
        },
      });
      for (let i = 0; i < N; i++) subject.next(i);
      subject.complete();
      blackhole(sum);
    });
  });

  group("consumer handover", () => {
    bench("attach, push, dispose x100", () => {
      const subject = EventSubject.create<number>();
      let sum = 0;
      for (let round = 0; round < 100; round++) {
        const handle = subject.subscribe(v => { sum += v; });
        for (let i = 0; i < 10; i++) subject.next(i);
        handle.dispose();
      }
      blackhole(sum);
    });

    bench("re-entrant push from next", () => {
      const subject = EventSubject.create<number>();
      let sum = 0;
      subject.subscribe(v => {
        sum += v;
        if (v < N) subject.next(v + 1);
      });
      subject.next(1);
      blackhole(sum);
    });
  });
});

await run();
