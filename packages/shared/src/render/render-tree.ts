/**
 * Inert render tree
 *
 * Content becomes text nodes and attribute values only. Every URL passes
 * through the allowlist first; a rejected link is shown as plain text and
 * rejected media is dropped.
 */

import type { ContentBundle, ContentSection } from '../types';
import { DEFAULT_ALLOWED_HOSTS, sanitizeUrl } from './safe-url';

export type RenderTag =
  | 'section'
  | 'h2'
  | 'h3'
  | 'p'
  | 'ul'
  | 'li'
  | 'table'
  | 'tbody'
  | 'tr'
  | 'td'
  | 'a'
  | 'img'
  | 'span';

export type RenderAttribute = 'class' | 'href' | 'src' | 'alt' | 'rel' | 'target' | 'loading';

export type RenderNode =
  | { type: 'text'; value: string }
  | {
      type: 'element';
      tag: RenderTag;
      attrs: Partial<Record<RenderAttribute, string>>;
      children: RenderNode[];
    };

export interface RenderOptions {
  allowedHosts?: readonly string[];
  /** Formats pricing amounts */
  formatAmount?: (amount: number, currency: string) => string;
}

function text(value: string): RenderNode {
  return { type: 'text', value };
}

function el(
  tag: RenderTag,
  attrs: Partial<Record<RenderAttribute, string>>,
  children: RenderNode[] = []
): RenderNode {
  return { type: 'element', tag, attrs, children };
}

function defaultFormatAmount(amount: number, currency: string): string {
  return `${currency} ${amount.toLocaleString('en-US')}`;
}

function link(label: string, url: string, hosts: readonly string[]): RenderNode {
  const href = sanitizeUrl(url, hosts);
  if (!href) {
    return el('span', { class: 'gate-link-blocked' }, [text(label)]);
  }
  return el('a', { href, rel: 'noopener noreferrer', target: '_blank' }, [text(label)]);
}

function renderSection(section: ContentSection, hosts: readonly string[], options: RenderOptions): RenderNode {
  const format = options.formatAmount ?? defaultFormatAmount;

  switch (section.kind) {
    case 'text':
      return el('section', { class: 'gate-text' }, [
        ...(section.title !== undefined ? [el('h3', {}, [text(section.title)])] : []),
        el('p', {}, [text(section.body)]),
      ]);
    case 'pricing':
      return el('section', { class: 'gate-pricing' }, [
        el('h3', {}, [text(section.title)]),
        el('table', {}, [
          el(
            'tbody',
            {},
            section.rows.map((row) =>
              el('tr', {}, [
                el('td', {}, [text(row.label)]),
                el('td', { class: 'gate-amount' }, [text(format(row.amount, section.currency))]),
                el('td', { class: 'gate-note' }, [text(row.note ?? '')]),
              ])
            )
          ),
        ]),
      ]);
    case 'checklist':
      return el('section', { class: 'gate-checklist' }, [
        el('h3', {}, [text(section.title)]),
        el(
          'ul',
          {},
          section.items.map((item) =>
            el('li', { class: item.done ? 'done' : 'todo' }, [text(item.label)])
          )
        ),
      ]);
    case 'gallery':
      return el('section', { class: 'gate-gallery' }, [
        el('h3', {}, [text(section.title)]),
        el(
          'ul',
          {},
          section.items.map((item) => {
            const cover = item.coverUrl !== undefined ? sanitizeUrl(item.coverUrl, hosts) : null;
            const children: RenderNode[] = [];
            if (cover) {
              children.push(el('img', { src: cover, alt: item.title, loading: 'lazy' }));
            }
            children.push(link(item.title, item.url, hosts));
            if (item.imageCount !== undefined) {
              children.push(el('span', { class: 'gate-count' }, [text(`${item.imageCount} photos`)]));
            }
            return el('li', {}, children);
          })
        ),
      ]);
    case 'link':
      return el('p', { class: 'gate-link' }, [link(section.label, section.url, hosts)]);
  }
}

export function toRenderTree(bundle: ContentBundle, options: RenderOptions = {}): RenderNode[] {
  const hosts = options.allowedHosts ?? DEFAULT_ALLOWED_HOSTS;
  const nodes: RenderNode[] = [];
  if (bundle.title !== undefined) {
    nodes.push(el('h2', {}, [text(bundle.title)]));
  }
  for (const section of bundle.sections) {
    nodes.push(renderSection(section, hosts, options));
  }
  return nodes;
}
