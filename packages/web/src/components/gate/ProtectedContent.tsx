import { createElement } from 'react';
import type { ReactNode } from 'react';
import { toRenderTree } from '@content-gate/shared';
import type { ContentBundle, RenderNode, RenderOptions } from '@content-gate/shared';

interface ProtectedContentProps extends RenderOptions {
  bundle: ContentBundle;
}

// Text nodes go through React's escaping; nothing is parsed as markup
function renderNode(node: RenderNode, key: number): ReactNode {
  if (node.type === 'text') {
    return node.value;
  }

  const { class: className, ...attrs } = node.attrs;
  return createElement(
    node.tag,
    { key, className, ...attrs },
    ...node.children.map((child, index) => renderNode(child, index))
  );
}

export function ProtectedContent({ bundle, allowedHosts, formatAmount }: ProtectedContentProps) {
  const nodes = toRenderTree(bundle, { allowedHosts, formatAmount });

  return <div className="gate-content">{nodes.map((node, index) => renderNode(node, index))}</div>;
}
