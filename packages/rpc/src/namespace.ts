/**
 * @fileoverview Method namespaces
 *
 * A method's namespace is the text before its first underscore:
 * `eth_chainId` belongs to `eth`. Only namespaces take part in fallback
 * resolution; the rest of the name is opaque.
 */

export const NAMESPACE_SEPARATOR = '_';

/**
 * Resolve the namespace of a method name.
 * Returns undefined when there is no separator or nothing before it.
 */
export function resolveNamespace(method: string): string | undefined {
  const index = method.indexOf(NAMESPACE_SEPARATOR);
  return index > 0 ? method.slice(0, index) : undefined;
}

/**
 * A namespace a fallback can be registered under: non-empty, no separator.
 */
export function isValidNamespace(namespace: string): boolean {
  return namespace.length > 0 && !namespace.includes(NAMESPACE_SEPARATOR);
}
