// Explicit refusal phrasing only; softer hedges ("may", "likely") are left
// to the groundedness judge.
const IGNORANCE_PHRASES = [
  "do not contain information",
  "does not contain information",
  "don't contain information",
  "doesn't contain information",
  "not contain any information",
  "do not contain the answer",
  "does not contain the answer",
  "do not contain the necessary",
  "cannot answer the question",
  "cannot answer this question",
  "unable to answer",
  "i cannot provide an answer",
  "i am unable to",
  "i don't know",
  "i do not know",
  "no relevant information",
  "outside the scope of",
  "is not discussed in",
  "are not discussed in",
  "do not address",
  "does not address",
  "not provided in the evidence",
  "cannot find this information",
];

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, " ");
}

export function findIgnorancePhrases(answer: string): string[] {
  const lower = normalize(answer);
  return IGNORANCE_PHRASES.filter((phrase) => lower.includes(phrase));
}

export function admitsIgnorance(answer: string): boolean {
  return findIgnorancePhrases(answer).length > 0;
}
