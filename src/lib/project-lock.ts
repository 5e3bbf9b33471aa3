/**
 * In-process keyed mutex.
 *
 * Tasks for the same project run one after another in call order; tasks for
 * different projects never wait on each other. A rejected task does not
 * block the ones queued behind it.
 */

export interface ProjectLock {
  run<T>(projectId: string, task: () => Promise<T>): Promise<T>;
  isLocked(projectId: string): boolean;
}

export function createProjectLock(): ProjectLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(projectId: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(projectId) ?? Promise.resolve();
      const result = previous.then(task);

      // Tail settles either way so the next task always gets its turn
      const tail = result.then(
        () => undefined,
        () => undefined
      );
      tails.set(projectId, tail);

      void tail.then(() => {
        if (tails.get(projectId) === tail) {
          tails.delete(projectId);
          console.debug(`[Lock] Released ${projectId}`);
        }
      });

      return result;
    },

    isLocked(projectId: string): boolean {
      return tails.has(projectId);
    },
  };
}
