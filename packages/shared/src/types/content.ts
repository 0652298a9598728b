/**
 * Content bundle types
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface TextSection {
  kind: 'text';
  title?: string;
  body: string;
}

export interface PricingRow {
  label: string;
  amount: number;
  note?: string;
}

export interface PricingSection {
  kind: 'pricing';
  title: string;
  currency: string;
  rows: PricingRow[];
}

export interface ChecklistItem {
  label: string;
  done: boolean;
}

export interface ChecklistSection {
  kind: 'checklist';
  title: string;
  items: ChecklistItem[];
}

export interface GalleryItem {
  title: string;
  url: string;
  coverUrl?: string;
  imageCount?: number;
}

export interface GallerySection {
  kind: 'gallery';
  title: string;
  items: GalleryItem[];
}

export interface LinkSection {
  kind: 'link';
  label: string;
  url: string;
}

export type ContentSection =
  | TextSection
  | PricingSection
  | ChecklistSection
  | GallerySection
  | LinkSection;

/** One tier's protected content */
export interface ContentBundle {
  title?: string;
  sections: ContentSection[];
}
