import type { Network, Plan } from '@opgraph/core';
import { dataNodeId, operationNodeId } from './manager.js';

export interface DotOptions {
  /** Plan whose steps are numbered and drawn bold */
  plan?: Plan;
  title?: string;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function attributes(attrs: Record<string, string>): string {
  const list = Object.entries(attrs).map(([key, value]) => `${key}=${value}`);
  return list.length ? ` [${list.join(', ')}]` : '';
}

/**
 * Render a network as Graphviz DOT: data as boxes, operations as ovals
 */
export function toDot(network: Network, options: DotOptions = {}): string {
  const steps = new Map<number, number>(options.plan?.steps.map((step, index) => [step.id, index + 1]));
  const lines = [`digraph ${quote(options.title ?? 'network')} {`];

  for (const data of network.dataNodes) {
    lines.push(`  ${quote(dataNodeId(data.name))}${attributes({ label: quote(data.name), shape: 'box' })};`);
  }
  for (const op of network.operationNodes) {
    const step = steps.get(op.id);
    const attrs: Record<string, string> = {
      label: quote(step === undefined ? op.name : `${step}: ${op.name}`),
      shape: 'oval',
    };
    if (step !== undefined) attrs.style = 'bold';
    lines.push(`  ${quote(operationNodeId(op.name))}${attributes(attrs)};`);
  }
  for (const edge of network.edges) {
    if (edge.kind === 'needs') {
      const source = quote(dataNodeId(network.dataNodes[edge.from].name));
      const target = quote(operationNodeId(network.operationNodes[edge.to].name));
      lines.push(`  ${source} -> ${target}${attributes(edge.optional ? { style: 'dashed' } : {})};`);
    } else {
      const source = quote(operationNodeId(network.operationNodes[edge.from].name));
      const target = quote(dataNodeId(network.dataNodes[edge.to].name));
      lines.push(`  ${source} -> ${target};`);
    }
  }

  lines.push('}');
  return lines.join('\n');
}
