/**
 * Project: Eventor Client
 * File: src/core/domain/organisation.ts
 * Summary: Organisation (club/federation) records and the known-or-unknown reference used on results.
 */

export type CountryName = {
  readonly languageId: string;
  readonly name: string;
};

export type Country = {
  readonly id: number;
  readonly names: readonly CountryName[];
};

export type Organisation = {
  readonly id: number;
  readonly name: string;
  readonly shortName: string;
  readonly mediaName?: string;
  readonly typeId: number;
  readonly country?: Country;
  readonly parentOrganisationId?: number;
};

/** Placeholder name Eventor uses for competitors without a club. */
export const UNKNOWN_ORGANISATION_NAME = 'Klubblös';

export type OrganisationRef =
  | { readonly kind: 'known'; readonly organisation: Organisation }
  | { readonly kind: 'unknown'; readonly name: string };

export const organisationName = (ref: OrganisationRef): string =>
  ref.kind === 'known' ? ref.organisation.name : ref.name;
