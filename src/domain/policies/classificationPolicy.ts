/**
 * Classification-Need Oracle
 * Layer: Domain
 *
 * Classification is the most expensive call per place, so it runs only when
 * there is none yet, when a prior write is partial, or when the website the
 * caller just observed differs from the stored one. It is never redone on a
 * schedule. Changes to address or phone do not count as drift.
 */
export interface ClassificationState {
  website: string | null;
  classifiedAt: string | null;
  mobilityFit: number | null;
  securityFit: number | null;
  voipFit: number | null;
  fleetAttach: number | null;
}

function present(value: string | null | undefined): value is string {
  return value != null && value.length > 0;
}

/** `state` is null when the place has never been stored. */
export function shouldClassify(
  state: ClassificationState | null,
  currentWebsite: string | null | undefined,
): boolean {
  if (state === null) return true;
  if (state.classifiedAt === null) return true;

  const fits = [state.mobilityFit, state.securityFit, state.voipFit, state.fleetAttach];
  if (fits.some((fit) => fit === null)) return true;

  if (present(currentWebsite)) {
    if (!present(state.website)) return true;
    if (currentWebsite !== state.website) return true;
  }

  return false;
}
