import { StorageConfigError } from "../../../errors"
import {
  allowsAnonymous,
  objectArn,
  parsePolicy,
  parsePolicyKind,
  policyKindFromSetting,
  serializePolicy,
  toNativePolicy,
} from "../bucket-policy"

const anyone = { AWS: "*" }

describe("toNativePolicy", () => {
  it("is null for NONE", () => {
    expect(toNativePolicy("media", "NONE")).toBeNull()
  })

  it("grants object reads for GET_ONLY", () => {
    expect(toNativePolicy("media", "GET_ONLY")).toEqual({
      Version: "2012-10-17",
      Statement: [
        {
          Sid: "",
          Effect: "Allow",
          Principal: anyone,
          Action: "s3:GetObject",
          Resource: "arn:aws:s3:::media/*",
        },
      ],
    })
  })

  it("adds bucket location and listing for READ_ONLY", () => {
    const policy = toNativePolicy("media", "READ_ONLY")

    expect(policy?.Statement.map(({ Action, Resource }) => [Action, Resource])).toEqual([
      ["s3:GetBucketLocation", "arn:aws:s3:::media"],
      ["s3:ListBucket", "arn:aws:s3:::media"],
      ["s3:GetObject", "arn:aws:s3:::media/*"],
    ])
  })

  it("grants multipart writes without reads for WRITE_ONLY", () => {
    const policy = toNativePolicy("media", "WRITE_ONLY")

    expect(policy?.Statement.map(({ Action, Resource }) => [Action, Resource])).toEqual([
      ["s3:GetBucketLocation", "arn:aws:s3:::media"],
      ["s3:ListBucketMultipartUploads", "arn:aws:s3:::media"],
      [
        [
          "s3:ListMultipartUploadParts",
          "s3:AbortMultipartUpload",
          "s3:DeleteObject",
          "s3:PutObject",
        ],
        "arn:aws:s3:::media/*",
      ],
    ])
  })

  it("uses list-form statements for READ_WRITE", () => {
    const policy = toNativePolicy("media", "READ_WRITE")

    expect(policy?.Statement).toHaveLength(4)
    expect(policy?.Statement[3]).toEqual({
      Sid: "",
      Effect: "Allow",
      Principal: anyone,
      Action: [
        "s3:ListMultipartUploadParts",
        "s3:GetObject",
        "s3:AbortMultipartUpload",
        "s3:DeleteObject",
        "s3:PutObject",
      ],
      Resource: ["arn:aws:s3:::media/*"],
    })
  })

  it("survives a serialize/parse trip", () => {
    const policy = toNativePolicy("media", "READ_WRITE")
    if (!policy) throw new Error("expected a policy")

    expect(parsePolicy(serializePolicy(policy))).toEqual(policy)
  })
})

describe("policy settings", () => {
  it.each([
    ["true", "GET_ONLY"],
    ["False", "NONE"],
    ["read_only", "READ_ONLY"],
    [" WRITE_ONLY ", "WRITE_ONLY"],
    ["none", "NONE"],
  ])("%j -> %s", (raw, kind) => {
    expect(policyKindFromSetting(raw)).toBe(kind)
  })

  it("rejects unknown names", () => {
    expect(policyKindFromSetting("public")).toBeUndefined()
    expect(() => parsePolicyKind("public")).toThrow(StorageConfigError)
    expect(() => parsePolicyKind("public")).toThrow("Unknown bucket policy: public")
  })
})

describe("parsePolicy", () => {
  it("rejects invalid JSON", () => {
    expect(() => parsePolicy("{")).toThrow("Bucket policy is not valid JSON")
  })

  it("rejects documents of the wrong shape", () => {
    expect(() => parsePolicy('{"Version":"2012-10-17"}')).toThrow(StorageConfigError)
    expect(() =>
      parsePolicy(
        '{"Version":"2012-10-17","Statement":[{"Effect":"Maybe","Principal":"*","Action":"s3:*","Resource":"*"}]}',
      ),
    ).toThrow(/Malformed bucket policy/)
  })
})

describe("allowsAnonymous", () => {
  const readOnly = toNativePolicy("media", "READ_ONLY")
  if (!readOnly) throw new Error("expected a policy")

  it("matches actions and resources", () => {
    expect(allowsAnonymous(readOnly, "s3:GetObject", objectArn("media", "a/b.jpg"))).toBe(true)
    expect(allowsAnonymous(readOnly, "s3:ListBucket", "arn:aws:s3:::media")).toBe(true)
    expect(allowsAnonymous(readOnly, "s3:PutObject", objectArn("media", "a.jpg"))).toBe(false)
    expect(allowsAnonymous(readOnly, "s3:GetObject", objectArn("other", "a.jpg"))).toBe(false)
  })

  it("ignores statements for named principals", () => {
    const policy = parsePolicy(
      JSON.stringify({
        Version: "2012-10-17",
        Statement: [
          {
            Effect: "Allow",
            Principal: { AWS: ["arn:aws:iam::123456789012:user/uploader"] },
            Action: "s3:*",
            Resource: "arn:aws:s3:::media/*",
          },
        ],
      }),
    )

    expect(allowsAnonymous(policy, "s3:GetObject", objectArn("media", "a.jpg"))).toBe(false)
  })

  it("lets Deny win", () => {
    const policy = parsePolicy(
      JSON.stringify({
        Version: "2012-10-17",
        Statement: [
          { Effect: "Allow", Principal: "*", Action: "s3:Get*", Resource: "arn:aws:s3:::media/*" },
          {
            Effect: "Deny",
            Principal: "*",
            Action: "s3:GetObject",
            Resource: "arn:aws:s3:::media/private/*",
          },
        ],
      }),
    )

    expect(allowsAnonymous(policy, "s3:GetObject", objectArn("media", "public/a.jpg"))).toBe(true)
    expect(allowsAnonymous(policy, "s3:GetObject", objectArn("media", "private/a.jpg"))).toBe(
      false,
    )
  })
})
