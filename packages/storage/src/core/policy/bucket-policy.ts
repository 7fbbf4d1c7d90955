import { z } from "zod"
import { StorageConfigError } from "../../errors"
import { isPolicyKind, type PolicyKind } from "../../ports/policy-kind"
import type { BucketName } from "../../ports/storage-object"

const oneOrMany = z.union([z.string(), z.array(z.string())])

const policyStatementSchema = z.object({
  Sid: z.string().optional(),
  Effect: z.enum(["Allow", "Deny"]),
  Principal: z.union([z.literal("*"), z.object({ AWS: oneOrMany })]),
  Action: oneOrMany,
  Resource: oneOrMany,
})

export const policyDocumentSchema = z.object({
  Version: z.literal("2012-10-17"),
  Statement: z.array(policyStatementSchema),
})

export type PolicyStatement = z.infer<typeof policyStatementSchema>
export type PolicyDocument = z.infer<typeof policyDocumentSchema>

const anonymous = { AWS: "*" }

export function bucketArn(bucket: BucketName): string {
  return `arn:aws:s3:::${bucket}`
}

function objectsArn(bucket: BucketName): string {
  return `arn:aws:s3:::${bucket}/*`
}

function allow(action: string | string[], resource: string | string[]): PolicyStatement {
  return { Sid: "", Effect: "Allow", Principal: anonymous, Action: action, Resource: resource }
}

const multipartWriteActions = [
  "s3:ListMultipartUploadParts",
  "s3:AbortMultipartUpload",
  "s3:DeleteObject",
  "s3:PutObject",
]

/**
 * Store-native policy document for `kind`, or null for NONE.
 */
export function toNativePolicy(bucket: BucketName, kind: PolicyKind): PolicyDocument | null {
  const statements = ((): PolicyStatement[] | null => {
    switch (kind) {
      case "NONE":
        return null
      case "GET_ONLY":
        return [allow("s3:GetObject", objectsArn(bucket))]
      case "READ_ONLY":
        return [
          allow("s3:GetBucketLocation", bucketArn(bucket)),
          allow("s3:ListBucket", bucketArn(bucket)),
          allow("s3:GetObject", objectsArn(bucket)),
        ]
      case "WRITE_ONLY":
        return [
          allow("s3:GetBucketLocation", bucketArn(bucket)),
          allow("s3:ListBucketMultipartUploads", bucketArn(bucket)),
          allow(multipartWriteActions, objectsArn(bucket)),
        ]
      case "READ_WRITE":
        return [
          allow(["s3:GetBucketLocation"], [bucketArn(bucket)]),
          allow(["s3:ListBucket"], [bucketArn(bucket)]),
          allow(["s3:ListBucketMultipartUploads"], [bucketArn(bucket)]),
          allow(
            [
              "s3:ListMultipartUploadParts",
              "s3:GetObject",
              "s3:AbortMultipartUpload",
              "s3:DeleteObject",
              "s3:PutObject",
            ],
            [objectsArn(bucket)],
          ),
        ]
      default: {
        const unknown: never = kind
        throw new StorageConfigError(`Unknown bucket policy: ${String(unknown)}`)
      }
    }
  })()

  if (!statements) return null

  return { Version: "2012-10-17", Statement: statements }
}

export function serializePolicy(policy: PolicyDocument): string {
  return JSON.stringify(policy)
}

/**
 * Reads a policy setting: a policy name, or a boolean where "true" means
 * GET_ONLY and "false" means NONE. Case-insensitive. Undefined when the
 * value is neither.
 */
export function policyKindFromSetting(raw: string): PolicyKind | undefined {
  const value = raw.trim().toUpperCase()

  if (value === "TRUE") return "GET_ONLY"
  if (value === "FALSE") return "NONE"
  if (isPolicyKind(value)) return value

  return undefined
}

/** {@link policyKindFromSetting}, throwing `StorageConfigError` for unknown values. */
export function parsePolicyKind(raw: string): PolicyKind {
  const kind = policyKindFromSetting(raw)
  if (kind === undefined) {
    throw new StorageConfigError(`Unknown bucket policy: ${raw}`, { context: { value: raw } })
  }

  return kind
}

/** Parses stored policy JSON. Throws `StorageConfigError` when malformed. */
export function parsePolicy(raw: string): PolicyDocument {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new StorageConfigError("Bucket policy is not valid JSON", { cause: err })
  }

  const result = policyDocumentSchema.safeParse(json)
  if (!result.success) {
    throw new StorageConfigError(`Malformed bucket policy\n${z.prettifyError(result.error)}`)
  }

  return result.data
}

function toList(value: string | string[]): string[] {
  return typeof value === "string" ? [value] : value
}

function matchesPattern(pattern: string, value: string): boolean {
  const source = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*")

  return new RegExp(`^${source}$`).test(value)
}

function isAnonymous(principal: PolicyStatement["Principal"]): boolean {
  return principal === "*" || toList(principal.AWS).includes("*")
}

/**
 * Whether `policy` lets an anonymous caller perform `action` on `resource`
 * (an ARN such as "arn:aws:s3:::media/a.jpg"). Deny wins over Allow.
 */
export function allowsAnonymous(
  policy: PolicyDocument,
  action: string,
  resource: string,
): boolean {
  const applicable = policy.Statement.filter(
    (statement) =>
      isAnonymous(statement.Principal) &&
      toList(statement.Action).some((pattern) => matchesPattern(pattern, action)) &&
      toList(statement.Resource).some((pattern) => matchesPattern(pattern, resource)),
  )

  if (applicable.some((statement) => statement.Effect === "Deny")) return false
  return applicable.some((statement) => statement.Effect === "Allow")
}

export function objectArn(bucket: BucketName, key: string): string {
  return `arn:aws:s3:::${bucket}/${key}`
}
