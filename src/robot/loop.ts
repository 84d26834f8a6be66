// src/robot/loop.ts

export type LoopHandle = {
  /** Resolves when the loop stops; rejects with the error that stopped it. */
  done: Promise<void>;
  stop(): void;
};

/**
 * Calls `step` once per period until it returns false, `stop()` is called,
 * or it throws. A period of 0 runs back to back, yielding to the event loop
 * between steps (used for replay).
 *
 * Steps never overlap: the next one is scheduled only after the previous one
 * returned.
 */
export function runFixedRate(periodMs: number, step: () => boolean): LoopHandle {
  let stopped = false;
  let timer: NodeJS.Timeout | undefined;
  let finish: () => void = () => {};

  const done = new Promise<void>((resolve, reject) => {
    finish = resolve;

    const tick = () => {
      if (stopped) return resolve();
      const started = Date.now();
      let keepGoing: boolean;
      try {
        keepGoing = step();
      } catch (err) {
        stopped = true;
        return reject(err);
      }
      if (!keepGoing) {
        stopped = true;
        return resolve();
      }
      if (periodMs === 0) {
        timer = setTimeout(tick, 0);
      } else {
        const wait = Math.max(0, periodMs - (Date.now() - started));
        timer = setTimeout(tick, wait);
      }
    };

    timer = setTimeout(tick, 0);
  });

  return {
    done,
    stop: () => {
      stopped = true;
      if (timer) clearTimeout(timer);
      finish();
    },
  };
}
