import type { ResolvedResort, ResortListing } from "./types";

/**
 * Resolve a typed resort name against a country's directory.
 *
 * Exact (case-insensitive) names win over substring matches; within each pass
 * the first listing in directory order wins.
 */
export function matchResort(
  country: string,
  typedName: string,
  available: readonly ResortListing[]
): ResolvedResort | null {
  const wanted = typedName.toLowerCase();

  const listing =
    available.find((r) => r.name.toLowerCase() === wanted) ??
    available.find((r) => r.name.toLowerCase().includes(wanted));
  if (!listing) return null;

  return {
    name: listing.name,
    country,
    url: listing.url,
    dataUrl: listing.dataUrl,
  };
}
