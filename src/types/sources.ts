/** Pin stanza set written to preferences.d/<id>. */
export interface PinRule {
  readonly id: string;
  readonly packages: readonly string[];
  /** Release codename, rendered as `Pin: release n=<release>`. */
  readonly release: string;
  readonly priority: number;
  /** One stanza per package instead of a single stanza listing them all. */
  readonly perPackage?: boolean;
  /** Comment lines written above the stanzas (without the leading "# "). */
  readonly header?: readonly string[];
}

export interface SigningKey {
  readonly url: string;
  /** File name under the keyrings directory, e.g. "docker.gpg". */
  readonly keyring: string;
  /** Pipe through `gpg --dearmor` (ASCII-armoured keys). */
  readonly dearmor: boolean;
}

/** A third-party apt repository. */
export interface RepoSource {
  readonly id: string;
  /**
   * One-line repository definition. `{arch}`, `{codename}` and `{keyring}`
   * are resolved by the registry before comparison and writing.
   */
  readonly entry: string;
  readonly signingKey?: SigningKey;
  readonly pin?: PinRule;
}

export type AddRepoResult =
  | { readonly status: "added"; readonly file: string; readonly line: string }
  | { readonly status: "already_present"; readonly file: string; readonly line: string };

export type RemoveRepoResult = "removed" | "absent";

export type ApplyPinResult = "written" | "unchanged";

export interface DedupResult {
  readonly removed: number;
  readonly rewritten: readonly string[];
  readonly deleted: readonly string[];
}
