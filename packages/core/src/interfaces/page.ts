/**
 * One page of a paged collection. `nextPage` is the cursor to pass back for
 * the following page; it is absent on the last page.
 */
export interface Page<T> {
  items: T[];
  hasMore: boolean;
  nextPage?: string;
}
