export interface Group<K, T> {
  key: K
  items: T[]
}

/** Groups in first-occurrence order; members keep their input order. */
export function groupStable<K, T>(items: Iterable<T>, keyOf: (item: T) => K): Group<K, T>[] {
  const groups = new Map<K, T[]>()

  for (const item of items) {
    const key = keyOf(item)
    const list = groups.get(key)
    if (list) {
      list.push(item)
    } else {
      groups.set(key, [item])
    }
  }

  return Array.from(groups, ([key, members]) => ({ key, items: members }))
}
