export const INSURANCE_TYPES = [
  "Travel",
  "Health",
  "Car",
  "Apartment",
  "Life",
  "Business",
  "Dental",
  "Mortgage",
] as const;

export type InsuranceType = (typeof INSURANCE_TYPES)[number];

export const DEFAULT_COLLECTION = "insurance_faq";

// Column limits of the collection table.
export const MAX_DOCUMENT_CHARS = 1000;
export const MAX_INSURANCE_TYPE_CHARS = 50;

export const DEFAULT_TOP_K = 2;
export const MAX_TOP_K = 20;

export function resolveInsuranceType(topic: string | null | undefined): InsuranceType | null {
  if (!topic) {
    return null;
  }
  const wanted = topic.trim().toLowerCase();
  return INSURANCE_TYPES.find((type) => type.toLowerCase() === wanted) ?? null;
}

export function getCollectionName(): string {
  return process.env.RAG_COLLECTION?.trim() || DEFAULT_COLLECTION;
}
