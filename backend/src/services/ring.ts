export type Ring<T> = {
  push: (item: T) => void;
  all: () => T[];
  latest: () => T | null;
  size: () => number;
};

/** Fixed-capacity buffer; `all()` returns oldest first. */
export function createRing<T>(capacity: number): Ring<T> {
  const cap = Math.max(1, Math.floor(capacity));
  const data: T[] = [];
  return {
    push(item: T) {
      if (data.length >= cap) data.shift();
      data.push(item);
    },
    all() {
      return data.slice();
    },
    latest() {
      return data.length ? data[data.length - 1] : null;
    },
    size() {
      return data.length;
    },
  };
}
