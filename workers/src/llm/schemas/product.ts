import { z } from "zod";
import { ANNOTATION_TYPES } from "../../types.js";

/**
 * Zod schema for a single product variant in the candidate answer.
 */
export const productSchema = z.object({
  product_name: z.string().describe("Product name as printed in the document"),
  variant_identifier: z
    .string()
    .describe(
      "Key distinguishing feature: model number, series, type or thickness",
    ),
  product_family: z
    .string()
    .describe("Product category, e.g. gypsum board, screws, insulation"),
  manufacturer: z.string().describe("Manufacturer or brand name"),
});

/**
 * Output constraint of the candidate pass. Only `products` is consumed;
 * the remaining fields are optional hints the model may fill in.
 */
export const candidatesResponseSchema = z
  .object({
    products: z
      .array(productSchema)
      .describe("Every product variant mentioned, in order of appearance"),
    confidence_score: z
      .number()
      .min(0)
      .max(1)
      .optional()
      .describe("Confidence (0.0-1.0) in the completeness of the list"),
    annotation_type: z
      .enum(ANNOTATION_TYPES)
      .optional()
      .describe("Kind of selection mark seen in the document, if any"),
    page_numbers: z
      .array(z.number().int())
      .optional()
      .describe("Pages the products were found on"),
  })
  .describe("Candidate products response");

export type CandidatesResponse = z.infer<typeof candidatesResponseSchema>;
