/** Policies, roles and mounts this agent manages all start with this prefix. */
export const CHARM_PREFIX = 'charm-';

export const CHARM_ACCESS_ROLE = 'local-charm-access';
export const CHARM_POLICY_NAME = 'local-charm-policy';

export const CHARM_POLICY = `
# Manage policies under the charm- prefix
path "sys/policy/charm-*" {
  capabilities = ["create", "read", "update", "delete"]
}

# List every policy
path "sys/policy/" {
  capabilities = ["list"]
}

# Manage approle roles under the charm- prefix
path "auth/approle/role/charm-*" {
  capabilities = ["create", "read", "update", "delete", "list"]
}

# Read and list approle roles
path "auth/approle/role" {
  capabilities = ["read"]
}
path "auth/approle/role/" {
  capabilities = ["list"]
}

# Mount and manage secret backends under the charm- prefix
path "sys/mounts/charm-*" {
  capabilities = ["create", "read", "update", "delete", "sudo"]
}

# Read and list secret backend mounts
path "sys/mounts" {
  capabilities = ["read"]
}
path "sys/mounts/" {
  capabilities = ["list"]
}`;

/** Access to `backend/hostname/*` only: one consumer, its own namespace. */
export function renderSecretBackendPolicy(backend: string, hostname: string): string {
  return `
path "${backend}/${hostname}/*" {
  capabilities = ["create", "read", "update", "delete", "list"]
}
`;
}

/** Access to everything under `backend/*`, shared by all consumers. */
export function renderSharedSecretBackendPolicy(backend: string): string {
  return `
path "${backend}/*" {
  capabilities = ["create", "read", "update", "delete", "list"]
}
`;
}
