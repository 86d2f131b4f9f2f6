// Only effective when node runs with --expose-gc.
export function reclaimMemory(): void {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc === "function") gc();
}
