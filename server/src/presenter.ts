import type { DirectoryListing } from 'sharedir-shared';

export interface PresentedListing {
  contentType: string;
  body: string;
}

/**
 * Turns a directory listing into a response body. The browsing UI lives
 * outside this package; the default hands clients the raw listing.
 */
export type ListingPresenter = (listing: DirectoryListing) => PresentedListing;

export const jsonPresenter: ListingPresenter = (listing) => ({
  contentType: 'application/json; charset=utf-8',
  body: JSON.stringify(listing),
});
