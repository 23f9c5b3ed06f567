import { z } from "zod/mini"

const channel = z.int().check(z.gte(0), z.lte(255))

export const colourTupleSchema = z.union([
  z.tuple([channel, channel, channel]),
  z.tuple([channel, channel, channel, channel]),
])

export const storeDefinitionSchema = z.strictObject({
  settings: z.optional(z.record(z.string(), z.nullable(z.string()))),
  customColours: z.optional(z.record(z.string(), colourTupleSchema)),
  comboColours: z.optional(z.array(colourTupleSchema)),
  allowDefaultComboColoursFallback: z.optional(z.boolean()),
  version: z.optional(z.nullable(z.union([z.number().check(z.positive()), z.literal("latest")]))),
})

export type StoreDefinition = z.infer<typeof storeDefinitionSchema>
export type ColourTuple = z.infer<typeof colourTupleSchema>
