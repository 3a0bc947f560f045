import { z } from 'zod'

export type Jsonable = string | number | boolean | null | readonly Jsonable[] | { readonly [key: string]: Jsonable }

const JsonLiteral = z.union([z.string(), z.number().finite(), z.boolean(), z.null()])

export const Jsonable: z.ZodType<Jsonable> = z.lazy(() =>
  z.union([JsonLiteral, z.array(Jsonable), z.record(Jsonable)]),
)
