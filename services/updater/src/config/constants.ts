export const DEFAULT_CONFIG_API_URL = "https://api.platform.network/config/compose/validator_vm";
export const DEFAULT_VMM_URL = "http://localhost:10300";
export const DEFAULT_PLATFORM_CONFIG_PATH = "/etc/platform-validator/config.json";
export const DEFAULT_MANAGED_VM_NAME = "validator_vm";

// VMM address as seen from inside the guest (QEMU user-net host alias).
export const DEFAULT_GUEST_VMM_URL = "http://10.0.2.2:10300/";

// What `config` writes into a fresh settings file; the guest-side VMM proxy port.
export const DEFAULT_CLI_GUEST_VMM_URL = "http://10.0.2.2:16850/";

export const VMM_URL_ENV_KEY = "DSTACK_VMM_URL";
export const FIXED_REQUIRED_ENV_KEYS = [VMM_URL_ENV_KEY, "HOTKEY_PASSPHRASE", "VALIDATOR_BASE_URL"] as const;

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
export const DEFAULT_STOP_TIMEOUT_MS = 60_000;
export const STOP_SETTLE_MS = 5_000;
export const REMOVE_GRACE_MS = 2_000;
export const REMOVE_RETRY_ATTEMPTS = 3;
export const REMOVE_RETRY_DELAY_MS = 3_000;

// VMM statuses that mean the guest is no longer serving and must be rebuilt.
export const STOPPED_VM_STATUSES: ReadonlySet<string> = new Set(["stopped", "exited", "killed", "error"]);

// The VMM keys applications by this many leading hex characters of the compose hash.
export const APP_ID_LENGTH = 40;

export const CLI_NAME = "compose-vm-updater";
