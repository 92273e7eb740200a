import { Array as Arr, Effect, Order } from "effect";

export type SortBy = "none" | "name" | "mtime" | "size";

export interface SortOptions {
  readonly sortBy?: SortBy;
  readonly reverse?: boolean;
}

/**
 * How to obtain each sort key for an item. Keys are fetched once per item
 * (decorate, sort, undecorate), never inside the comparator.
 */
export interface SortKeys<A, E, R> {
  readonly name: (item: A) => string;
  readonly mtime: (item: A) => Effect.Effect<number, E, R>;
  readonly size: (item: A) => Effect.Effect<number, E, R>;
}

const undecorate = <K, A>(
  decorated: ReadonlyArray<readonly [K, A]>,
  order: Order.Order<K>,
  reverse: boolean
): ReadonlyArray<A> =>
  Arr.sort(
    decorated,
    Order.mapInput(reverse ? Order.reverse(order) : order, ([key]: readonly [K, A]) => key)
  ).map(([, item]) => item);

const decorateWith = <A, E, R>(
  items: ReadonlyArray<A>,
  key: (item: A) => Effect.Effect<number, E, R>,
  reverse: boolean
): Effect.Effect<ReadonlyArray<A>, E, R> =>
  Effect.map(
    Effect.forEach(items, (item) => Effect.map(key(item), (k) => [k, item] as const)),
    (decorated) => undecorate(decorated, Order.number, reverse)
  );

/**
 * Stable sort by the chosen key. `reverse` orders descending while items with
 * equal keys stay in their original order.
 */
export const sortItems = <A, E, R>(
  items: ReadonlyArray<A>,
  options: SortOptions,
  keys: SortKeys<A, E, R>
): Effect.Effect<ReadonlyArray<A>, E, R> => {
  const reverse = options.reverse ?? false;

  switch (options.sortBy ?? "none") {
    case "none":
      return Effect.succeed(items);
    case "name":
      return Effect.succeed(
        undecorate(
          items.map((item) => [keys.name(item).toLowerCase(), item] as const),
          Order.string,
          reverse
        )
      );
    case "mtime":
      return decorateWith(items, keys.mtime, reverse);
    case "size":
      return decorateWith(items, keys.size, reverse);
  }
};
