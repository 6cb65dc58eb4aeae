import { toError } from '../errors.js';

export interface NamedTask<T> {
  name: string;
  run: () => Promise<T>;
}

export interface TaskGroupResult<T> {
  results: Map<string, T>;
  failures: Array<{ name: string; error: Error }>;
}

/**
 * Run every task concurrently and wait for all of them. A failing task does
 * not cancel its siblings; failures come back paired with the task name.
 */
export async function joinAll<T>(tasks: NamedTask<T>[]): Promise<TaskGroupResult<T>> {
  const settled = await Promise.allSettled(tasks.map((task) => task.run()));

  const results = new Map<string, T>();
  const failures: TaskGroupResult<T>['failures'] = [];
  settled.forEach((outcome, index) => {
    const name = tasks[index].name;
    if (outcome.status === 'fulfilled') {
      results.set(name, outcome.value);
    } else {
      failures.push({ name, error: toError(outcome.reason) });
    }
  });
  return { results, failures };
}
