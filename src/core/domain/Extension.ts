import { Array as Arr, Data, Equal, Option, Order, pipe } from "effect";
import { extname } from "node:path";

/**
 * Normalized file extension.
 *
 * `Known` always carries a lower-cased suffix with its leading dot (".txt").
 * Extensionless files, dotfiles such as ".bashrc" and names ending in a bare
 * dot are `None`, so no real suffix can ever collide with the sentinel.
 */
export type Extension = Data.TaggedEnum<{
  Known: { readonly value: string };
  None: {};
}>;

export const Extension = Data.taggedEnum<Extension>();

export const fromFileName = (name: string): Extension => {
  const suffix = extname(name).toLowerCase();
  return suffix.length > 1 ? Extension.Known({ value: suffix }) : Extension.None();
};

export const label = (extension: Extension): string =>
  Extension.$match(extension, {
    Known: ({ value }) => value,
    None: () => "<none>",
  });

/**
 * Per-extension totals in order of first encounter.
 */
export type ExtensionTally = ReadonlyArray<readonly [Extension, number]>;

export const tallyOf = (tally: ExtensionTally, extension: Extension): number =>
  pipe(
    tally,
    Arr.findFirst(([candidate]) => Equal.equals(candidate, extension)),
    Option.map(([, value]) => value),
    Option.getOrElse(() => 0)
  );

export const tallyTotal = (tally: ExtensionTally): number =>
  tally.reduce((sum, [, value]) => sum + value, 0);

const byValueDescending: Order.Order<readonly [Extension, number]> = Order.mapInput(
  Order.reverse(Order.number),
  ([, value]: readonly [Extension, number]) => value
);

/**
 * Highest `n` entries by value. Equal values keep their encounter order.
 */
export const topEntries = (tally: ExtensionTally, n: number): ExtensionTally =>
  pipe(tally, Arr.sort(byValueDescending), Arr.take(n));
