/**
 * Enrichment-Need Oracle
 * Layer: Domain
 *
 * Decides whether a place needs the metered details call. Phone and maps link
 * make a record call-ready; website is nice to have but is often missing
 * upstream, so its absence alone never triggers another call.
 */
export interface ContactState {
  phone: string | null;
  mapsUrl: string | null;
}

/** `state` is null when the place has never been stored. */
export function needsDetails(state: ContactState | null): boolean {
  if (state === null) return true;
  if (state.phone === null) return true;
  if (state.mapsUrl === null) return true;
  return false;
}
