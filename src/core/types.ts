export interface Diagnostic {
  severity: 'error' | 'warning';
  code: string;
  message: string;
  hint?: string;
  // Where in the input description the problem sits, e.g. `edges[3]` or `nodes.a`
  path?: string;
}

export type Engine = 'dagreish' | 'conservative';
