import type { Category } from "./types.js";

export interface CategoryCatalogEntry {
  category: Category;
  title: string;
  description: string;
  defaultWeight: number;
}

export const CATEGORY_CATALOG: ReadonlyArray<CategoryCatalogEntry> = [
  {
    category: "images",
    title: "Image text alternatives",
    description:
      "Images carry a concise alt text, or an empty alt only when they are purely decorative.",
    defaultWeight: 15,
  },
  {
    category: "headings",
    title: "Heading structure",
    description:
      "The page has exactly one h1 and heading levels descend without skipping.",
    defaultWeight: 15,
  },
  {
    category: "links",
    title: "Descriptive links",
    description:
      "Link text is present, describes its destination and is not reused for different destinations.",
    defaultWeight: 10,
  },
  {
    category: "forms",
    title: "Form labels",
    description:
      "Every input, select and textarea has a programmatic label.",
    defaultWeight: 15,
  },
  {
    category: "structure",
    title: "Page structure",
    description:
      "The page declares its language and title and exposes header, navigation, main and footer landmarks.",
    defaultWeight: 20,
  },
  {
    category: "contrast",
    title: "Color contrast",
    description:
      "Inline text and background colors meet 4.5:1 (normal text) or 3:1 (large text).",
    defaultWeight: 15,
  },
  {
    category: "keyboard",
    title: "Keyboard access",
    description:
      "Interactive elements stay in the tab order, custom widgets are focusable and focus remains visible.",
    defaultWeight: 10,
  },
];

export function categoryTitle(category: Category): string {
  return CATEGORY_CATALOG.find((entry) => entry.category === category)?.title ?? category;
}
