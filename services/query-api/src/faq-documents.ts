import { z } from "zod";

import { MAX_DOCUMENT_CHARS, resolveInsuranceType, type InsuranceType } from "./constants.js";

export const AggregateEntrySchema = z.object({
  source_file: z.string(),
  topic: z.string().nullable(),
  source_url: z.string().nullable(),
  data: z.unknown(),
});

export const AggregateDocumentSchema = z.object({
  metadata: z
    .object({
      total_files: z.number().int().nonnegative(),
      source_directory: z.string(),
      files_processed: z.array(z.string()),
    })
    .passthrough(),
  content: z.array(AggregateEntrySchema),
});

export type AggregateDocument = z.infer<typeof AggregateDocumentSchema>;

const FaqDataSchema = z.object({ faqs: z.array(z.unknown()) }).passthrough();

const FaqItemSchema = z
  .object({
    question: z.string().optional(),
    answer_text: z.string().optional(),
  })
  .passthrough();

export type FaqDocumentBatch = {
  insuranceType: InsuranceType;
  documents: string[];
};

export type SkippedEntry = {
  source_file: string;
  topic: string | null;
};

export type FaqDocuments = {
  batches: FaqDocumentBatch[];
  skipped: SkippedEntry[];
};

function questionText(question: string): string {
  return question.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim();
}

export function faqToDocument(question: string, answerText: string): string {
  return `${questionText(question)}\n${answerText.trim()}`.trim().slice(0, MAX_DOCUMENT_CHARS);
}

/**
 * Groups the FAQs of an aggregate document by insurance type. Batches come
 * out in the order their type first appears; entries whose topic is not an
 * insurance type are reported in `skipped`.
 */
export function buildFaqDocuments(aggregate: AggregateDocument): FaqDocuments {
  const byType = new Map<InsuranceType, string[]>();
  const skipped: SkippedEntry[] = [];

  for (const entry of aggregate.content) {
    const insuranceType = resolveInsuranceType(entry.topic);
    if (!insuranceType) {
      skipped.push({ source_file: entry.source_file, topic: entry.topic });
      continue;
    }

    const data = FaqDataSchema.safeParse(entry.data);
    if (!data.success) {
      continue;
    }

    const documents = byType.get(insuranceType) ?? [];
    for (const item of data.data.faqs) {
      const faq = FaqItemSchema.safeParse(item);
      if (!faq.success) {
        continue;
      }
      const document = faqToDocument(faq.data.question ?? "", faq.data.answer_text ?? "");
      if (document) {
        documents.push(document);
      }
    }
    byType.set(insuranceType, documents);
  }

  return {
    batches: Array.from(byType, ([insuranceType, documents]) => ({ insuranceType, documents })),
    skipped,
  };
}
