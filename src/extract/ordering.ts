import { ListingOrder } from "../config/sourceRegistry";
import { ExtractionError } from "../errors";

export interface Candidate {
  value: string;
  date: Date | null;
  variables: Record<string, string>;
}

function compareLexicographic(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparatorFor(order: ListingOrder): (a: Candidate, b: Candidate) => number {
  switch (order) {
    case "lexicographic":
      return (a, b) => compareLexicographic(a.value, b.value);
    case "natural":
      return (a, b) => a.value.localeCompare(b.value, "en", { numeric: true });
    case "date":
      return (a, b) => {
        const diff = (a.date?.getTime() ?? 0) - (b.date?.getTime() ?? 0);
        return diff !== 0 ? diff : compareLexicographic(a.value, b.value);
      };
  }
}

/** The greatest candidate under `order`; ties keep the first one seen. */
export function pickNewest(candidates: Candidate[], order: ListingOrder): Candidate {
  if (candidates.length === 0) {
    throw new ExtractionError("no candidates to choose from");
  }
  if (order === "date") {
    const undated = candidates.find((candidate) => candidate.date === null);
    if (undated) {
      throw new ExtractionError(`entry ${JSON.stringify(undated.value)} has no date`);
    }
  }

  const compare = comparatorFor(order);
  return candidates.reduce((best, candidate) => (compare(candidate, best) > 0 ? candidate : best));
}
