import type { LayoutGraph } from './types.js';
import { graphConfig } from './util.js';

/*
 * Positioning always works top to bottom. `adjust` maps the other rank
 * directions into that frame before positioning and `undo` maps the result
 * back.
 */

export function adjust(g: LayoutGraph): void {
  const rankDir = graphConfig(g).rankdir.toLowerCase();
  if (rankDir === 'lr' || rankDir === 'rl') {
    swapWidthHeight(g);
  }
}

export function undo(g: LayoutGraph): void {
  const rankDir = graphConfig(g).rankdir.toLowerCase();
  if (rankDir === 'bt' || rankDir === 'rl') {
    reverseY(g);
  }
  if (rankDir === 'lr' || rankDir === 'rl') {
    swapXY(g);
    swapWidthHeight(g);
  }
}

interface Sized {
  width: number;
  height: number;
}

interface Positioned {
  x?: number;
  y?: number;
}

function swapWidthHeight(g: LayoutGraph): void {
  for (const v of g.nodes()) swapWidthHeightOne(g.node(v));
  for (const e of g.edges()) swapWidthHeightOne(g.edge(e));
}

function swapWidthHeightOne(attrs: Sized | undefined): void {
  if (!attrs) return;
  const w = attrs.width;
  attrs.width = attrs.height;
  attrs.height = w;
}

function reverseY(g: LayoutGraph): void {
  for (const v of g.nodes()) reverseYOne(g.node(v));
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (!edge) continue;
    for (const p of edge.points ?? []) reverseYOne(p);
    reverseYOne(edge);
  }
}

function reverseYOne(attrs: Positioned | undefined): void {
  if (attrs?.y !== undefined) attrs.y = -attrs.y;
}

function swapXY(g: LayoutGraph): void {
  for (const v of g.nodes()) swapXYOne(g.node(v));
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (!edge) continue;
    for (const p of edge.points ?? []) swapXYOne(p);
    if (edge.x !== undefined) swapXYOne(edge);
  }
}

function swapXYOne(attrs: Positioned | undefined): void {
  if (!attrs) return;
  const x = attrs.x;
  attrs.x = attrs.y;
  attrs.y = x;
}
