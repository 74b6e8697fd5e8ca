/**
 * @internal
 * Whether `child` is `parent` itself or one of its descendants.
 */
export const isOrContains = (parent: Node, child: Node): boolean =>
  parent === child || parent.contains(child);
