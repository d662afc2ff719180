// ============================================
// THEME DESCRIPTORS
// ============================================
// Static, process-wide table describing what each theme looks for.
// Keywords feed the text scorer, preferred categories the category affinity,
// exclusions remove activities that must never appear for a theme.

import type { PoiCategory, Theme } from "@/types";

export interface ThemeDescriptor {
  theme: Theme;
  label: string;
  description: string;
  keywords: readonly string[];
  preferredCategories: readonly PoiCategory[];
  exclusions: readonly string[];
}

export const THEME_DESCRIPTORS: Readonly<Record<Theme, ThemeDescriptor>> = {
  cultural: {
    theme: "cultural",
    label: "Cultural",
    description: "Museums, monuments and historic sites",
    keywords: ["museum", "monument", "historic", "temple", "gallery", "heritage", "church", "mosque", "castle", "ruins"],
    preferredCategories: ["tourist place", "market"],
    exclusions: [],
  },
  adventure: {
    theme: "adventure",
    label: "Adventure",
    description: "Outdoor and active experiences",
    keywords: ["nature", "beach", "desert", "hiking", "diving", "snorkel", "quad", "safari", "kayak", "trail", "climb"],
    preferredCategories: ["park"],
    exclusions: [],
  },
  foodies: {
    theme: "foodies",
    label: "Foodies",
    description: "Restaurants, cafes and food markets",
    keywords: ["restaurant", "cafe", "market", "street food", "bakery", "eatery", "diner"],
    preferredCategories: ["restaurant", "market"],
    exclusions: [],
  },
  family: {
    theme: "family",
    label: "Family",
    description: "Parks, zoos and places for children",
    keywords: ["park", "zoo", "aquarium", "children", "playground", "amusement", "family"],
    preferredCategories: ["park", "tourist place"],
    exclusions: ["nightclub", "casino", "adults only", "strip club"],
  },
  couples: {
    theme: "couples",
    label: "Couples",
    description: "Romantic spots and scenic views",
    keywords: ["romantic", "sunset", "candlelight", "spa", "scenic", "viewpoint", "resort"],
    preferredCategories: ["restaurant", "tourist place"],
    exclusions: [],
  },
  friends: {
    theme: "friends",
    label: "Friends",
    description: "Nightlife, sports and group fun",
    keywords: ["bar", "club", "sports", "fun", "nightlife", "escape room", "bowling"],
    preferredCategories: ["entertainment", "restaurant"],
    exclusions: [],
  },
};

export function getThemeDescriptor(theme: Theme): ThemeDescriptor {
  return THEME_DESCRIPTORS[theme];
}

/**
 * Text embedded by the feature builder to produce a theme vector.
 */
export function buildThemeDescriptorText(theme: Theme): string {
  const descriptor = THEME_DESCRIPTORS[theme];
  return `${descriptor.label} trip: ${descriptor.description}. ${descriptor.keywords.join(", ")}`;
}
