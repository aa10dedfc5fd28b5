/** Opaque per-book options, interpreted only by the matching adapter. */
export type BookOptions = Readonly<Record<string, string>>;

export interface SportConfig {
  readonly key: string;
  readonly displayName: string;
  /** IANA zone used for local game dates */
  readonly timezone: string;
  /** Normalized raw team name -> canonical code */
  readonly teamAliases: Readonly<Record<string, string>>;
  readonly books: Readonly<Record<string, BookOptions>>;
}

export type SportCatalog = Readonly<Record<string, SportConfig>>;
