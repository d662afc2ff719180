import { generateRequestId, jsonSuccess } from "@/lib/api-response";
import { THEME_DESCRIPTORS } from "@/lib/theme-descriptors";
import { THEMES } from "@/types";

export async function GET() {
  const themes = THEMES.map((theme) => {
    const descriptor = THEME_DESCRIPTORS[theme];
    return {
      id: theme,
      label: descriptor.label,
      description: descriptor.description,
      keywords: descriptor.keywords,
      preferredCategories: descriptor.preferredCategories,
    };
  });

  return jsonSuccess({ themes }, generateRequestId());
}
