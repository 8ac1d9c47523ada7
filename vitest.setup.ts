// Node has no animation frames; StarMap's loop only needs the scheduling contract.
if (typeof globalThis.requestAnimationFrame === "undefined") {
  let nextHandle = 1;
  const timers = new Map<number, ReturnType<typeof setTimeout>>();

  globalThis.requestAnimationFrame = (callback: FrameRequestCallback): number => {
    const handle = nextHandle++;
    timers.set(
      handle,
      setTimeout(() => {
        timers.delete(handle);
        callback(Date.now());
      }, 16)
    );
    return handle;
  };

  globalThis.cancelAnimationFrame = (handle: number): void => {
    const timer = timers.get(handle);
    if (timer !== undefined) {
      clearTimeout(timer);
      timers.delete(handle);
    }
  };
}
