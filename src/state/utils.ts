import { type ZodType, z } from "zod"

/**
 * Parse data with a Zod schema and log errors
 * @param schema
 * @param data
 */
export function zParse<T extends ZodType>(schema: T, data: unknown): z.output<T> {
  try {
    return schema.parse(data)
  } catch (e) {
    if (e instanceof z.ZodError) {
      console.error(z.prettifyError(e), e)
    }
    throw e
  }
}
