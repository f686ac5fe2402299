export type ScheduleTask = (task: () => void) => void;

export const queueMicrotaskOrPromise: ScheduleTask = (task) => {
  if (typeof queueMicrotask === "function") {
    queueMicrotask(task);
    return;
  }
  void Promise.resolve().then(task);
};
