export const LANES = ['gemini_llm', 'gemini_files', 'bundles'] as const;

export type Lane = (typeof LANES)[number];

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  gemini_llm: 2,
  gemini_files: 4,
  bundles: 1,
};

export class LaneLimiter {
  private queues: Map<Lane, Array<() => void>> = new Map();
  private running: Map<Lane, number> = new Map();
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
    for (const lane of LANES) {
      this.queues.set(lane, []);
      this.running.set(lane, 0);
    }
  }

  /** Effective concurrency of a lane; unset, non-numeric or sub-1 limits count as 1. */
  capacity(lane: Lane): number {
    const configured = this.config[lane];
    return Number.isFinite(configured) ? Math.max(1, Math.floor(configured)) : 1;
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const max = this.capacity(lane);
    const running = this.running.get(lane) || 0;

    if (running < max) {
      this.running.set(lane, running + 1);
      try {
        return await fn();
      } finally {
        this.running.set(lane, (this.running.get(lane) || 1) - 1);
        this.processQueue(lane);
      }
    }

    return new Promise<T>((resolve, reject) => {
      this.queueFor(lane).push(() => {
        this.running.set(lane, (this.running.get(lane) || 0) + 1);
        fn()
          .then(resolve, reject)
          .finally(() => {
            this.running.set(lane, (this.running.get(lane) || 1) - 1);
            this.processQueue(lane);
          });
      });
    });
  }

  private queueFor(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }

  private processQueue(lane: Lane): void {
    const queue = this.queueFor(lane);
    const running = this.running.get(lane) || 0;
    const max = this.capacity(lane);

    if (running < max) {
      const next = queue.shift();
      if (next) next();
    }
  }
}

const globalLimiterConfig: LimiterConfig = {
  gemini_llm: Number(process.env.GEMINI_LLM_CONCURRENCY || '2'),
  gemini_files: Number(process.env.GEMINI_FILES_CONCURRENCY || '4'),
  bundles: Number(process.env.BATCH_CONCURRENCY || '1'),
};

export const sharedLimiter = new LaneLimiter(globalLimiterConfig);

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return sharedLimiter.limit(lane, fn);
}
