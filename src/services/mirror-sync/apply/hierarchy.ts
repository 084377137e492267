/**
 * Finds every cycle in a parent-pointer forest. Each cycle is reported once,
 * rotated so its smallest uid comes first. Parents that are not themselves
 * nodes end a chain.
 */
export function findParentCycles(
  parents: ReadonlyMap<string, string | null>,
): string[][] {
  const DONE = 2
  const ON_PATH = 1
  const state = new Map<string, number>()
  const cycles: string[][] = []

  for (const start of parents.keys()) {
    if (state.has(start)) continue

    const path: string[] = []
    let current: string | null | undefined = start
    while (current != null && parents.has(current) && !state.has(current)) {
      state.set(current, ON_PATH)
      path.push(current)
      current = parents.get(current)
    }

    if (current != null && state.get(current) === ON_PATH) {
      const cycle = path.slice(path.indexOf(current))
      const smallest = cycle.indexOf([...cycle].sort()[0] ?? current)
      cycles.push([...cycle.slice(smallest), ...cycle.slice(0, smallest)])
    }

    for (const uid of path) state.set(uid, DONE)
  }

  return cycles
}
