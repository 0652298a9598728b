/**
 * Content bundle validation
 * Narrows decrypted JSON into the section union the renderer understands.
 */

import type {
  ChecklistItem,
  ContentBundle,
  ContentSection,
  GalleryItem,
  JsonValue,
  PricingRow,
} from '../types';
import { FormatError } from '../errors';

type JsonObject = { [key: string]: JsonValue };

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new FormatError(`${path}.${key} must be a string`);
  }
  return value;
}

function optionalString(obj: JsonObject, key: string, path: string): string | undefined {
  return obj[key] === undefined ? undefined : requireString(obj, key, path);
}

function requireArray(obj: JsonObject, key: string, path: string): JsonValue[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw new FormatError(`${path}.${key} must be an array`);
  }
  return value;
}

function requireObject(value: JsonValue, path: string): JsonObject {
  if (!isObject(value)) {
    throw new FormatError(`${path} must be an object`);
  }
  return value;
}

function parsePricingRow(value: JsonValue, path: string): PricingRow {
  const obj = requireObject(value, path);
  const amount = obj.amount;
  if (typeof amount !== 'number') {
    throw new FormatError(`${path}.amount must be a number`);
  }
  const note = optionalString(obj, 'note', path);
  return { label: requireString(obj, 'label', path), amount, ...(note !== undefined ? { note } : {}) };
}

function parseChecklistItem(value: JsonValue, path: string): ChecklistItem {
  const obj = requireObject(value, path);
  if (typeof obj.done !== 'boolean') {
    throw new FormatError(`${path}.done must be a boolean`);
  }
  return { label: requireString(obj, 'label', path), done: obj.done };
}

function parseGalleryItem(value: JsonValue, path: string): GalleryItem {
  const obj = requireObject(value, path);
  const item: GalleryItem = {
    title: requireString(obj, 'title', path),
    url: requireString(obj, 'url', path),
  };
  const coverUrl = optionalString(obj, 'coverUrl', path);
  if (coverUrl !== undefined) item.coverUrl = coverUrl;
  if (obj.imageCount !== undefined) {
    if (typeof obj.imageCount !== 'number' || !Number.isInteger(obj.imageCount) || obj.imageCount < 0) {
      throw new FormatError(`${path}.imageCount must be a non-negative integer`);
    }
    item.imageCount = obj.imageCount;
  }
  return item;
}

function parseSection(value: JsonValue, path: string): ContentSection {
  const obj = requireObject(value, path);

  switch (obj.kind) {
    case 'text': {
      const title = optionalString(obj, 'title', path);
      return { kind: 'text', body: requireString(obj, 'body', path), ...(title !== undefined ? { title } : {}) };
    }
    case 'pricing':
      return {
        kind: 'pricing',
        title: requireString(obj, 'title', path),
        currency: requireString(obj, 'currency', path),
        rows: requireArray(obj, 'rows', path).map((row, i) => parsePricingRow(row, `${path}.rows[${i}]`)),
      };
    case 'checklist':
      return {
        kind: 'checklist',
        title: requireString(obj, 'title', path),
        items: requireArray(obj, 'items', path).map((item, i) => parseChecklistItem(item, `${path}.items[${i}]`)),
      };
    case 'gallery':
      return {
        kind: 'gallery',
        title: requireString(obj, 'title', path),
        items: requireArray(obj, 'items', path).map((item, i) => parseGalleryItem(item, `${path}.items[${i}]`)),
      };
    case 'link':
      return { kind: 'link', label: requireString(obj, 'label', path), url: requireString(obj, 'url', path) };
    default:
      throw new FormatError(`${path}.kind is not a known section`);
  }
}

/**
 * @throws FormatError naming the first offending path
 */
export function parseContentBundle(value: JsonValue): ContentBundle {
  const obj = requireObject(value, 'bundle');
  const bundle: ContentBundle = {
    sections: requireArray(obj, 'sections', 'bundle').map((section, i) =>
      parseSection(section, `bundle.sections[${i}]`)
    ),
  };
  const title = optionalString(obj, 'title', 'bundle');
  if (title !== undefined) bundle.title = title;
  return bundle;
}
