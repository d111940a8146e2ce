import { z } from "zod";

import {
  DEFAULT_TOP_K,
  MAX_DOCUMENT_CHARS,
  MAX_INSURANCE_TYPE_CHARS,
  MAX_TOP_K,
} from "./constants.js";

const InsuranceTypeSchema = z.string().trim().min(1).max(MAX_INSURANCE_TYPE_CHARS);

export const InsertDocumentsRequestSchema = z
  .object({
    insurance_type: InsuranceTypeSchema,
    documents: z.array(z.string().min(1).max(MAX_DOCUMENT_CHARS)).min(1).max(500),
  })
  .strict();

export const SearchRequestSchema = z
  .object({
    insurance_type: InsuranceTypeSchema,
    query: z.string().min(2),
    top_k: z.number().int().min(1).max(MAX_TOP_K).default(DEFAULT_TOP_K),
  })
  .strict();
