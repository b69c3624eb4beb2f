/**
 * Human-readable kind of a collaborator, for diagnostics only.
 * Class instances report their class name; anything else is "anonymous".
 */
export function describeCollaborator(value: object): string {
  const ctorName = value.constructor?.name
  return ctorName && ctorName !== 'Object' ? ctorName : 'anonymous'
}
