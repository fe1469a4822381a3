export const CATEGORIES = ['API', 'HTTP', 'QUICK', 'DEPRECATED'] as const;

export type Category = (typeof CATEGORIES)[number];

export interface TestDescriptor {
  readonly name: string;
  readonly category: Category;
  readonly timeoutSeconds: number;
  readonly expectedOutput?: string; // not checked by any runner
  readonly command?: readonly string[]; // argv override; `{name}` is substituted
}
