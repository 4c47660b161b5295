// src/utils/buildTMGraph.ts
import {
  HALT,
  formatNextState,
  type NextState,
  type Transition,
  type TransitionTable,
} from '@mytypes/TMTypes';

export type TMGraphEdge = {
  from: number;
  to: NextState;
  labels: string[];
  transitions: Transition[];
};

export type TMGraph = {
  nodes: NextState[];
  edges: TMGraphEdge[];
};

const dirKey = (from: number, to: NextState) => `${from}→${formatNextState(to)}`;

function fmtTransition(t: Transition): string {
  return `${t.read} / ${t.write} / ${t.move}`;
}

/**
 * Builds the state graph of a transition table.
 * - Nodes: every state number in first-seen order, HALT last
 * - Edges: one per directed pair, carrying the labels of all rows between them
 */
export function buildTMGraph(table: TransitionTable): TMGraph {
  const states = new Set<number>();
  table.forEach((t) => {
    states.add(t.number);
    if (t.next !== HALT) states.add(t.next);
  });

  const edgesByPair = new Map<string, TMGraphEdge>();
  table.forEach((t) => {
    const key = dirKey(t.number, t.next);
    const acc: TMGraphEdge = edgesByPair.get(key) ?? { from: t.number, to: t.next, labels: [], transitions: [] };
    acc.labels.push(fmtTransition(t));
    acc.transitions.push(t);
    edgesByPair.set(key, acc);
  });

  return {
    nodes: [...states, HALT],
    edges: Array.from(edgesByPair.values()),
  };
}

// Text diagram, one block per state. The active state is starred.
export function renderTMGraph(graph: TMGraph, activeState: NextState | null): string {
  const lines: string[] = [];

  for (const node of graph.nodes) {
    const marker = node === activeState ? '*' : ' ';
    lines.push(`${marker} (${formatNextState(node)})`);

    graph.edges
      .filter((edge) => edge.from === node)
      .forEach((edge) => {
        const arrow = edge.to === node ? '↺' : `→ (${formatNextState(edge.to)})`;
        edge.labels.forEach((label) => lines.push(`    ${arrow} ${label}`));
      });
  }

  return lines.join('\n');
}
