import { z } from "zod";
import { FormatRequestError, TitleValidationError, errorMessage } from "./errors";

export interface FormatRequest {
  titleData: unknown;
  text: string;
}

const FormatRequestBody = z.object({
  // Multipart forms send the title data as a JSON string
  titleData: z.unknown(),
  text: z.string().optional(),
});

/**
 * Reads a format request from a JSON body or from a multipart form whose
 * text arrived as an uploaded file.
 */
export function readFormatRequest(body: unknown, uploadedText?: string): FormatRequest {
  const parsed = FormatRequestBody.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.path.join(".") || "body").join(", ");
    throw new FormatRequestError(`Invalid request body: ${issues}`);
  }

  let titleData = parsed.data.titleData;
  if (typeof titleData === "string") {
    try {
      titleData = JSON.parse(titleData);
    } catch (parseError) {
      throw new TitleValidationError(`Invalid title data JSON: ${errorMessage(parseError)}`, ["titleData"]);
    }
  }

  const text = uploadedText ?? parsed.data.text;
  if (text === undefined) {
    throw new FormatRequestError("No text provided: send a text field or upload a document");
  }

  return { titleData, text };
}

/**
 * File name for a rendered document, derived from its title.
 */
export function outputFileName(titleData: unknown, now = Date.now()): string {
  const title =
    typeof titleData === "object" && titleData !== null && "title" in titleData && typeof titleData.title === "string"
      ? titleData.title
      : "";
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, 60);
  return `${slug || "document"}-${now}.docx`;
}

/**
 * HTTP status for a failed format request: 400 for bad input, 500 otherwise.
 */
export function errorStatus(error: unknown): 400 | 500 {
  return error instanceof TitleValidationError || error instanceof FormatRequestError ? 400 : 500;
}
