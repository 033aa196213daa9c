import { describe, it, expect, vi, afterEach } from "vitest"
import { z, getFieldMeta } from "@/schema/meta"
import { fieldsOf } from "@/schema/fields"
import { SchemaError } from "@/types"

describe("field metadata", () => {
  it("should store the external key", () => {
    expect(getFieldMeta(z.string().json("first_name"))).toEqual({ key: "first_name" })
  })

  it("should reject an empty external key", () => {
    expect(() => z.string().json("")).toThrow(SchemaError)
  })

  it("should combine json() and omitEmpty()", () => {
    expect(getFieldMeta(z.string().nullable().omitEmpty().json("nick"))).toEqual({ key: "nick", omitEmpty: true })
  })

  it("should read metadata set inside an optional wrapper", () => {
    expect(getFieldMeta(z.string().json("inner").nullable())).toEqual({ key: "inner" })
  })

  it("should prefer the outermost key", () => {
    expect(getFieldMeta(z.string().json("inner").optional().json("outer")).key).toBe("outer")
  })

  it("should not modify the original schema", () => {
    const base = z.string()
    base.json("renamed")

    expect(getFieldMeta(base)).toEqual({})
  })

  it("should keep other metadata", () => {
    const schema = z.string().describe("A name").json("name_key")

    expect(schema.description).toBe("A name")
    expect(getFieldMeta(schema).key).toBe("name_key")
  })
})

describe("fieldsOf", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("should list fields in declaration order", () => {
    const schema = z.object({
      zeta: z.string(),
      alpha: z.number().json("a"),
      middle: z.boolean().nullable().omitEmpty(),
    })

    expect(fieldsOf(schema).map((field) => [field.name, field.key, field.optional, field.omitEmpty])).toEqual([
      ["zeta", "zeta", false, false],
      ["alpha", "a", false, false],
      ["middle", "middle", true, true],
    ])
  })

  it("should mark only .optional() fields as undefinable", () => {
    const [nullable, optional, nullish] = fieldsOf(
      z.object({ a: z.string().nullable(), b: z.string().optional(), c: z.string().nullish() }),
    )

    expect([nullable.undefinable, optional.undefinable, nullish.undefinable]).toEqual([false, true, false])
  })

  it("should look inside lazy fields for an optional wrapper", () => {
    const [field] = fieldsOf(z.object({ n: z.lazy(() => z.string().optional()) }))
    expect([field.optional, field.undefinable]).toEqual([true, true])
  })

  it("should name the field whose union is rejected", () => {
    const schema = z.object({ pick: z.union([z.string(), z.number()]).json("choice") })

    try {
      fieldsOf(schema)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaError)
      if (error instanceof SchemaError) {
        expect(error.field).toEqual({ name: "pick", key: "choice" })
        expect(error.message).toBe("Unions must be exactly 'T or null', got 2 non-null of 2 alternatives")
      }
    }
  })

  it("should cache fields per schema", () => {
    const schema = z.object({ a: z.string() })
    expect(fieldsOf(schema)).toBe(fieldsOf(schema))
  })

  it("should warn once about duplicate external keys", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)

    fieldsOf(z.object({ first: z.string().json("dup_key"), second: z.string().json("dup_key") }))
    fieldsOf(z.object({ first: z.string().json("dup_key"), second: z.string().json("dup_key") }))

    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith(
      "[json-marshal] Fields 'first' and 'second' share the JSON key 'dup_key'; the last one wins",
    )
  })
})
