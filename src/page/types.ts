/**
 * Inventory of a rendered advertiser page: which tags it uses and which images it shows.
 */

/** Distinct lowercase tag names in first-occurrence document order */
export type TagInventory = string[];

export type ImageRef = {
  /** Absolute http(s) URL or data: URI */
  sourceLocator: string;
};

export type PageInventory = {
  tags: TagInventory;
  images: ImageRef[];
};
