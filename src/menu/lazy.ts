/**
 * Late-bound values for menu labels and carousel choice lists.
 *
 * A menu field is either fixed when the menu is defined, or produced
 * each time the menu is drawn (labels that show a flag, lists read from
 * the loader environment).
 */
export type Lazy<T> =
  | { kind: 'static'; value: T }
  | { kind: 'producer'; produce: () => T };

export function fixed<T>(value: T): Lazy<T> {
  return { kind: 'static', value };
}

export function computed<T>(produce: () => T): Lazy<T> {
  return { kind: 'producer', produce };
}

export function resolve<T>(lazy: Lazy<T>): T {
  return lazy.kind === 'static' ? lazy.value : lazy.produce();
}
