export type ClusterRole = 'leader' | 'follower';

/**
 * Leadership plus the key/value settings every peer can read. Writes are only
 * valid from the current leader; implementations may reject them otherwise.
 */
export interface LeaderElection {
  isLeader(): Promise<boolean>;
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  /** Writes all values or none. */
  setMany(values: Record<string, string>): Promise<void>;
}

export type BootstrapSecrets = {
  rootToken: string;
  unsealKeys: string[];
  shares: number;
  threshold: number;
};
