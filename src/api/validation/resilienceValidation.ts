import { z } from "zod";

export const resourceParamsSchema = z.object({
  name: z
    .string()
    .min(1, "Resource name is required")
    .max(128, "Resource name is too long")
    .regex(/^[\w.:-]+$/, "Resource name may only contain letters, digits, _ . : -"),
});
