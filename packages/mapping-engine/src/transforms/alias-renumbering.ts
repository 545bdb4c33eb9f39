const INDEXED_ALIAS = /^(.*?)(\d+)$/;

/**
 * New names for the survivors of an alias chain.
 *
 * When every original alias is <prefix><n> with one shared prefix, the
 * survivors are renumbered from the smallest original index in their
 * original order (t0,t2,t3 -> t0,t1,t2). Other chains keep their names.
 */
export function contiguousRenames(
  original: readonly string[],
  survivors: readonly string[]
): Map<string, string> {
  const renames = new Map<string, string>(survivors.map((alias) => [alias, alias]));

  let prefix: string | undefined;
  let start = Number.POSITIVE_INFINITY;
  for (const alias of original) {
    const match = INDEXED_ALIAS.exec(alias);
    if (!match) return renames;
    const [, aliasPrefix = '', digits = ''] = match;
    if (prefix !== undefined && aliasPrefix !== prefix) return renames;
    prefix = aliasPrefix;
    start = Math.min(start, Number.parseInt(digits, 10));
  }

  if (prefix === undefined) return renames;

  survivors.forEach((alias, offset) => {
    renames.set(alias, `${prefix}${start + offset}`);
  });
  return renames;
}
