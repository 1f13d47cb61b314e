import { parse, stringify } from "lossless-json";
import { z } from "zod";
import { FormatError, describeError } from "../errors";

const configEntrySchema = z
  .object({
    title: z.unknown().optional(),
    data: z.unknown().optional()
  })
  .passthrough();

const configDocumentSchema = z
  .object({
    data: z
      .object({
        entries: z.array(configEntrySchema)
      })
      .passthrough()
  })
  .passthrough();

export type ConfigEntry = z.infer<typeof configEntrySchema>;
export type ConfigDocument = z.infer<typeof configDocumentSchema>;

// Validates in place so the document keeps its own objects and key order.
function assertConfigDocument(value: unknown): asserts value is ConfigDocument {
  const result = configDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new FormatError(
      "config_invalid_structure",
      "Config document must contain a \"data.entries\" array of objects",
      result.error.issues
    );
  }
}

export function loadConfigDocument(raw: string | Buffer): ConfigDocument {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");

  // Numbers stay as LosslessNumber so untouched values keep their exact digits.
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    throw new FormatError("config_invalid_json", `Config document is not valid JSON: ${describeError(error)}`);
  }

  assertConfigDocument(parsed);
  return parsed;
}

export function configEntries(doc: ConfigDocument): ConfigEntry[] {
  return doc.data.entries;
}

export function serializeConfigDocument(doc: ConfigDocument): string {
  const text = stringify(doc, null, 4);
  if (text === undefined) {
    throw new FormatError("config_serialize_failed", "Config document could not be serialized");
  }
  return text;
}
