import { describe, it, expect } from "vitest"
import { z, calendarDate } from "@/schema/meta"
import { classify, inspect, kindOf } from "@/schema/classify"
import { CalendarDate } from "@/temporal/calendar-date"
import { SchemaError } from "@/types"

describe("classify", () => {
  describe("composites", () => {
    it("should classify objects as records", () => {
      expect(classify(z.object({ name: z.string() }))).toBe("record")
    })

    it("should classify arrays as sequences", () => {
      expect(classify(z.array(z.number()))).toBe("sequence")
    })

    it("should classify records with string keys as mappings", () => {
      expect(classify(z.record(z.string(), z.number()))).toBe("mapping")
    })

    it("should expose the element schema of a sequence", () => {
      const element = z.string()
      const node = inspect(z.array(element))

      expect(node.kind).toBe("sequence")
      expect(node.kind === "sequence" ? node.element : undefined).toBe(element)
    })
  })

  describe("leaves", () => {
    it("should classify enums and literals as enums", () => {
      expect(classify(z.enum(["A", "B"]))).toBe("enum")
      expect(classify(z.literal("only"))).toBe("enum")
    })

    it("should classify uuids as identifiers", () => {
      expect(classify(z.uuid())).toBe("identifier")
      expect(classify(z.guid())).toBe("identifier")
    })

    it("should classify dates as timestamps", () => {
      expect(classify(z.date())).toBe("timestamp")
    })

    it("should classify calendarDate() as calendar-date", () => {
      expect(classify(calendarDate())).toBe("calendar-date")
      expect(classify(calendarDate().json("day"))).toBe("calendar-date")
    })

    it("should tell integers from floats", () => {
      expect(classify(z.number().int())).toBe("integer")
      expect(classify(z.number())).toBe("float")
    })

    it("should classify strings, string formats, booleans and null", () => {
      expect(classify(z.string())).toBe("string")
      expect(classify(z.email())).toBe("string")
      expect(classify(z.boolean())).toBe("boolean")
      expect(classify(z.null())).toBe("null")
    })

    it("should unwrap lazy schemas", () => {
      expect(classify(z.lazy(() => z.string()))).toBe("string")
    })
  })

  describe("enum labels", () => {
    it("should label enums by their description", () => {
      const node = inspect(z.enum(["S", "M"]).describe("Size"))
      expect(node.kind === "enum" ? node.label : undefined).toBe("Size")
    })

    it("should list the values when there is no description", () => {
      const node = inspect(z.enum(["S", "M"]))
      expect(node.kind === "enum" ? node.label : undefined).toBe("Enum(S|M)")
    })
  })

  describe("optional types", () => {
    it("should classify null values as null", () => {
      expect(classify(z.string().nullable(), null)).toBe("null")
      expect(classify(z.string().optional(), undefined)).toBe("null")
      expect(classify(z.union([z.date(), z.null()]), null)).toBe("null")
    })

    it("should classify present values by the inner type", () => {
      expect(classify(z.date().nullable(), new Date(0))).toBe("timestamp")
      expect(classify(z.number().int().nullish(), 3)).toBe("integer")
      expect(classify(z.union([z.null(), z.array(z.string())]), [])).toBe("sequence")
    })

    it("should need a value to classify an optional type", () => {
      expect(() => classify(z.string().nullable())).toThrow(SchemaError)
    })
  })

  describe("unsupported schemas", () => {
    it("should reject unions of several non-null types", () => {
      expect(() => classify(z.union([z.string(), z.number()]), "a")).toThrow(
        "Unions must be exactly 'T or null', got 2 non-null of 2 alternatives",
      )
    })

    it("should reject schemas without a JSON form", () => {
      expect(() => classify(z.any())).toThrow("Schema type 'any' is not currently supported")
      expect(() => classify(z.bigint())).toThrow("Schema type 'bigint' is not currently supported")
    })
  })

  it("should return the same node for the same schema", () => {
    const schema = z.object({ a: z.string() })
    expect(inspect(schema)).toBe(inspect(schema))
  })
})

describe("kindOf", () => {
  it("should read the kind of primitive values", () => {
    expect(kindOf("a")).toBe("string")
    expect(kindOf(1)).toBe("integer")
    expect(kindOf(1.5)).toBe("float")
    expect(kindOf(false)).toBe("boolean")
    expect(kindOf(null)).toBe("null")
    expect(kindOf(undefined)).toBe("null")
  })

  it("should read the kind of dates, arrays and plain objects", () => {
    expect(kindOf(new Date(0))).toBe("timestamp")
    expect(kindOf(new CalendarDate(2020, 1, 1))).toBe("calendar-date")
    expect(kindOf([1, 2])).toBe("sequence")
    expect(kindOf({ a: 1 })).toBe("record")
  })

  it("should return undefined for values without a JSON form", () => {
    expect(kindOf(Number.NaN)).toBeUndefined()
    expect(kindOf(() => 1)).toBeUndefined()
    expect(kindOf(new Map())).toBeUndefined()
    expect(kindOf(10n)).toBeUndefined()
  })
})
