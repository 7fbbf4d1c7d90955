export const policyKinds = [
  "NONE",
  "GET_ONLY",
  "READ_ONLY",
  "WRITE_ONLY",
  "READ_WRITE",
] as const

/** Anonymous-access level applied to a freshly created bucket. */
export type PolicyKind = (typeof policyKinds)[number]

export function isPolicyKind(value: string): value is PolicyKind {
  return policyKinds.some((kind) => kind === value)
}
