import { z } from "zod";
import { SwissUid } from "../domain/value/swiss-uid.js";

export const swissUidSchema = z
  .string({ required_error: "validation.uid.required" })
  .min(1, "validation.uid.required")
  .transform((value, ctx) => {
    const result = SwissUid.safeParse(value);
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.messageKey,
        params: { code: result.error.code, expected: result.error.expected }
      });
      return z.NEVER;
    }
    return result.data;
  });

export const swissUidStringSchema = swissUidSchema.transform((uid) => uid.toString());
