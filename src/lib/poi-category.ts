// ============================================
// POI CATEGORY NORMALIZATION
// ============================================
// Source data uses free-form type strings ("Boutique Hotel", "Street food",
// "Souk"). Everything is folded into the closed PoiCategory set at load time.

import { POI_CATEGORIES } from "@/types";
import type { PoiCategory } from "@/types";

/**
 * Ordered rules: the first rule naming one of the type's words wins, e.g.
 * "hotel restaurant" is a hotel and "food market" a market. Words match
 * whole, with an optional plural; stems match any word they begin
 * ("lodg" covers lodge and lodging).
 */
interface CategoryRule {
  category: PoiCategory;
  words: readonly string[];
  stems?: readonly string[];
}

const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: "hotel", words: ["hotel", "resort", "hostel", "inn", "guesthouse", "motel"], stems: ["lodg"] },
  { category: "market", words: ["market", "bazaar", "souk", "souq"] },
  {
    category: "restaurant",
    words: ["restaurant", "cafe", "café", "bar", "pub", "food", "eatery", "bakery", "diner", "bistro"],
  },
  { category: "shop", words: ["shop", "shopping", "mall", "store", "boutique"] },
  { category: "park", words: ["park", "garden", "beach", "nature", "reserve", "zoo", "aquarium"] },
  {
    category: "tourist place",
    words: [
      "museum",
      "tourist",
      "monument",
      "landmark",
      "viewpoint",
      "temple",
      "mosque",
      "church",
      "cathedral",
      "castle",
      "citadel",
      "palace",
      "ruin",
      "pyramid",
      "gallery",
      "historic",
    ],
  },
  {
    category: "entertainment",
    words: ["club", "nightclub", "nightlife", "entertainment", "cinema", "theatre", "theater", "bowling", "casino"],
  },
];

function matchesWord(word: string, term: string): boolean {
  return word === term || word === `${term}s` || word === `${term}es`;
}

function matchesRule(words: readonly string[], rule: CategoryRule): boolean {
  return words.some(
    (word) =>
      rule.words.some((term) => matchesWord(word, term)) ||
      (rule.stems ?? []).some((stem) => word.startsWith(stem))
  );
}

const EXACT_CATEGORIES: ReadonlySet<string> = new Set<string>(POI_CATEGORIES);

function isPoiCategory(value: string): value is PoiCategory {
  return EXACT_CATEGORIES.has(value);
}

export function normalizeCategory(rawType: string | null | undefined): PoiCategory {
  const value = (rawType ?? "").trim().toLowerCase();
  if (!value) return "other";
  if (isPoiCategory(value)) return value;

  const words = value.split(/[^\p{L}]+/u).filter(Boolean);
  const rule = CATEGORY_RULES.find((candidate) => matchesRule(words, candidate));
  return rule ? rule.category : "other";
}

export function isHotelCategory(category: PoiCategory): boolean {
  return category === "hotel";
}
