/** Half-open `[start, finish)` interval over epoch milliseconds, identified by `id`. */
export interface IntervalEntry {
  id: string;
  start: number;
  finish: number;
}

interface IntervalNode extends IntervalEntry {
  /** Largest `finish` in this subtree */
  maxFinish: number;
  height: number;
  left: IntervalNode | null;
  right: IntervalNode | null;
}

function compareKeys(a: Pick<IntervalEntry, 'id' | 'start'>, b: Pick<IntervalEntry, 'id' | 'start'>): number {
  if (a.start !== b.start) {
    return a.start - b.start;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

function heightOf(node: IntervalNode | null): number {
  return node ? node.height : 0;
}

function update(node: IntervalNode): void {
  node.height = 1 + Math.max(heightOf(node.left), heightOf(node.right));
  node.maxFinish = Math.max(
    node.finish,
    node.left ? node.left.maxFinish : -Infinity,
    node.right ? node.right.maxFinish : -Infinity,
  );
}

function rotateRight(node: IntervalNode): IntervalNode {
  const pivot = node.left;
  if (!pivot) {
    return node;
  }
  node.left = pivot.right;
  pivot.right = node;
  update(node);
  update(pivot);
  return pivot;
}

function rotateLeft(node: IntervalNode): IntervalNode {
  const pivot = node.right;
  if (!pivot) {
    return node;
  }
  node.right = pivot.left;
  pivot.left = node;
  update(node);
  update(pivot);
  return pivot;
}

function rebalance(node: IntervalNode): IntervalNode {
  update(node);
  const balance = heightOf(node.left) - heightOf(node.right);

  if (balance > 1 && node.left) {
    if (heightOf(node.left.left) < heightOf(node.left.right)) {
      node.left = rotateLeft(node.left);
    }
    return rotateRight(node);
  }

  if (balance < -1 && node.right) {
    if (heightOf(node.right.right) < heightOf(node.right.left)) {
      node.right = rotateRight(node.right);
    }
    return rotateLeft(node);
  }

  return node;
}

function insertNode(node: IntervalNode | null, entry: IntervalEntry): IntervalNode {
  if (!node) {
    return { ...entry, maxFinish: entry.finish, height: 1, left: null, right: null };
  }

  if (compareKeys(entry, node) < 0) {
    node.left = insertNode(node.left, entry);
  } else {
    node.right = insertNode(node.right, entry);
  }
  return rebalance(node);
}

function detachMin(node: IntervalNode): { min: IntervalNode; rest: IntervalNode | null } {
  if (!node.left) {
    return { min: node, rest: node.right };
  }
  const { min, rest } = detachMin(node.left);
  node.left = rest;
  return { min, rest: rebalance(node) };
}

function toEntry(node: IntervalNode): IntervalEntry {
  return { id: node.id, start: node.start, finish: node.finish };
}

/**
 * AVL tree of intervals ordered by `(start, id)` and augmented with the
 * subtree's maximum finish, so overlap queries skip every subtree that ends
 * at or before the probe.
 *
 * Keys must be unique; remove an entry before re-inserting it with new bounds.
 */
export class IntervalTree {
  private root: IntervalNode | null = null;
  private count = 0;

  get size(): number {
    return this.count;
  }

  insert(entry: IntervalEntry): void {
    this.root = insertNode(this.root, entry);
    this.count++;
  }

  /** Removes the entry with this `(start, id)` key. Returns false when it is not present. */
  remove(key: Pick<IntervalEntry, 'id' | 'start'>): boolean {
    let removed = false;

    const removeFrom = (node: IntervalNode | null): IntervalNode | null => {
      if (!node) {
        return null;
      }

      const comparison = compareKeys(key, node);
      if (comparison < 0) {
        node.left = removeFrom(node.left);
      } else if (comparison > 0) {
        node.right = removeFrom(node.right);
      } else {
        removed = true;
        if (!node.left || !node.right) {
          return node.left ?? node.right;
        }
        const { min, rest } = detachMin(node.right);
        min.left = node.left;
        min.right = rest;
        return rebalance(min);
      }
      return rebalance(node);
    };

    this.root = removeFrom(this.root);
    if (removed) {
      this.count--;
    }
    return removed;
  }

  /** Entries with `start <= at < finish`. */
  containing(at: number): IntervalEntry[] {
    const results: IntervalEntry[] = [];
    this.collect(this.root, at, (start) => start <= at, results);
    return results;
  }

  /** Entries with `start < to && finish > from`. */
  overlapping(from: number, to: number): IntervalEntry[] {
    const results: IntervalEntry[] = [];
    this.collect(this.root, from, (start) => start < to, results);
    return results;
  }

  /** All entries in `(start, id)` order. */
  entries(): IntervalEntry[] {
    const results: IntervalEntry[] = [];
    const walk = (node: IntervalNode | null) => {
      if (!node) {
        return;
      }
      walk(node.left);
      results.push(toEntry(node));
      walk(node.right);
    };
    walk(this.root);
    return results;
  }

  /** Height of the tree; 0 when empty. */
  get height(): number {
    return heightOf(this.root);
  }

  clear(): void {
    this.root = null;
    this.count = 0;
  }

  private collect(
    node: IntervalNode | null,
    finishesAfter: number,
    startAccepted: (start: number) => boolean,
    results: IntervalEntry[],
  ): void {
    if (!node || node.maxFinish <= finishesAfter) {
      return;
    }

    this.collect(node.left, finishesAfter, startAccepted, results);

    // Right subtree starts no earlier than this node
    if (!startAccepted(node.start)) {
      return;
    }
    if (node.finish > finishesAfter) {
      results.push(toEntry(node));
    }
    this.collect(node.right, finishesAfter, startAccepted, results);
  }
}
