import { logLevelNames } from "@stowage/logger"
import { z } from "zod"
import { policyKindFromSetting } from "../core/policy/bucket-policy"

const flag = (fallback: boolean) => z.union([z.boolean(), z.stringbool()]).default(fallback)

const policyKind = z
  .string()
  .default("NONE")
  .transform((raw, ctx) => {
    const kind = policyKindFromSetting(raw)
    if (kind !== undefined) return kind

    ctx.issues.push({
      code: "custom",
      message: `Unknown bucket policy "${raw}"; use NONE, GET_ONLY, READ_ONLY, WRITE_ONLY, READ_WRITE, true or false`,
      input: raw,
    })
    return z.NEVER
  })

/** A JSON object of string values, e.g. {"Cache-Control":"max-age=1000"} */
const objectMetadata = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw)
      return parsed
    } catch {
      ctx.issues.push({ code: "custom", message: "Expected a JSON object", input: raw })
      return z.NEVER
    }
  })
  .pipe(z.record(z.string(), z.string()))

const optionalText = z.string().optional()

export const storageEnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("stowage"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag(false),

  STORAGE_ENDPOINT: z.string().min(1),
  STORAGE_ACCESS_KEY: z.string().min(1),
  STORAGE_SECRET_KEY: z.string().min(1),
  STORAGE_REGION: z.string().min(1).default("us-east-1"),
  STORAGE_USE_HTTPS: flag(true),

  STORAGE_MEDIA_BUCKET_NAME: z.string().min(1),
  STORAGE_MEDIA_BASE_URL: optionalText,
  STORAGE_MEDIA_USE_PRESIGNED: flag(false),
  STORAGE_MEDIA_AUTO_CREATE_BUCKET: flag(false),
  STORAGE_MEDIA_ASSUME_BUCKET_EXISTS: flag(false),
  STORAGE_MEDIA_AUTO_CREATE_POLICY: policyKind,
  STORAGE_MEDIA_OBJECT_METADATA: objectMetadata.optional(),
  STORAGE_MEDIA_FILE_OVERWRITE: flag(true),
  STORAGE_MEDIA_BACKUP_BUCKET: optionalText,
  STORAGE_MEDIA_BACKUP_FORMAT: optionalText,

  STORAGE_STATIC_BUCKET_NAME: optionalText,
  STORAGE_STATIC_BASE_URL: optionalText,
  STORAGE_STATIC_USE_PRESIGNED: flag(false),
  STORAGE_STATIC_AUTO_CREATE_BUCKET: flag(false),
  STORAGE_STATIC_ASSUME_BUCKET_EXISTS: flag(false),
  STORAGE_STATIC_AUTO_CREATE_POLICY: policyKind,
  STORAGE_STATIC_OBJECT_METADATA: objectMetadata.optional(),
  STORAGE_STATIC_FILE_OVERWRITE: flag(true),
  STORAGE_STATIC_BACKUP_BUCKET: optionalText,
  STORAGE_STATIC_BACKUP_FORMAT: optionalText,
})

export type StorageEnv = z.infer<typeof storageEnvSchema>
