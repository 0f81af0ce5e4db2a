/** Keyset pagination: `cursor` is the id of the last record already seen. */
export interface PageRequest {
  limit: number;
  cursor?: string;
}

export interface Page<T> {
  data: T[];
  hasMore: boolean;
  /** Present only when `hasMore` is true. */
  nextCursor?: string;
}
