export interface PlatformConfig {
  /** VMM address handed to the guest as DSTACK_VMM_URL. */
  vmmUrl?: string;
  /** Insertion order is kept on disk but carries no meaning. */
  env?: Record<string, string>;
}
