/** Delivers a callback to the caller's context without blocking the frame path. */
export type Dispatcher = (task: () => void) => void;

export const inlineDispatcher: Dispatcher = task => task();

export const deferredDispatcher: Dispatcher = task => {
  setImmediate(task);
};
