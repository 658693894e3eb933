type CrawlTask = {
  readonly url: string;
  readonly depth: number;
};

type TaskState = 'pending' | 'in-progress' | 'done';

type FrontierEntry = {
  task: CrawlTask;
  state: TaskState;
};

type DequeueOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export type { CrawlTask, TaskState, FrontierEntry, DequeueOptions };
