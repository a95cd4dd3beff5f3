export type CatalogSourceEntry = {
  name: string;
  path: string;
  durationSec: number | null;
};

export interface CatalogSourcePort {
  /** Ordered enumeration of every candidate resource. */
  list(): Promise<CatalogSourceEntry[]>;
}
