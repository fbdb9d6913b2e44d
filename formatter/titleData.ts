import { z } from "zod";
import { TitleValidationError } from "./errors";
import type { TitleData } from "./types";

// JSON clients send null for fields they leave out
const optionalField = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const TitleDataSchema = z.object({
  title: z
    .string({ required_error: "Missing required title field: title" })
    .trim()
    .min(1, "Missing required title field: title"),
  author: optionalField,
  institution: optionalField,
  course: optionalField,
  instructor: optionalField,
  date: optionalField,
});

/**
 * Validates title page data before any rendering starts.
 */
export function validateTitleData(input: unknown): TitleData {
  const result = TitleDataSchema.safeParse(input);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((issue) => issue.path.join(".") || "titleData"))];
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new TitleValidationError(`Invalid title data: ${message}`, fields);
  }
  return result.data;
}
