import type { Endpoint } from "../endpoint/types";

export type Context = {
  /** Default endpoint id per service kind */
  defaults: Record<string, string>;
  /** Catalog order; ids are unique */
  endpoints: Endpoint[];
};

export type Catalog = {
  version: number;
  currentContext: string | null;
  contexts: Record<string, Context>;
};

export type ContextMetadata = {
  name: string;
  selected: boolean;
};
