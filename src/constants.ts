import type { RouterLocators } from './types.js';

/** Console address of a factory-default Linksys router */
export const DEFAULT_ROUTER_URL = 'http://192.168.1.1';

/** Seconds to wait for any single console element */
export const DEFAULT_TIMEOUT_SECONDS = 30;

/** Pause after login; the console has no reliable "ready" signal */
export const DEFAULT_SETTLE_DELAY_MS = 10_000;

/** Pause after opening Troubleshooting, before clicking the Diagnostics tab */
export const DEFAULT_TAB_DELAY_MS = 5_000;

/** Element identifiers of the Linksys web console */
export const LINKSYS_LOCATORS: RouterLocators = {
  passwordInput: { strategy: 'id', value: 'adminPass', label: 'password field' },
  submitButton: { strategy: 'id', value: 'submit-login', label: 'login button' },
  troubleshootingIcon: {
    strategy: 'id',
    value: 'iconTroubleshooting',
    label: 'Troubleshooting icon',
  },
  diagnosticsTab: { strategy: 'id', value: 'diagnosticsTab', label: 'Diagnostics tab' },
  ipAddress: { strategy: 'id', value: 'ip-addr', label: 'ISP IP address' },
};

/** Record type managed by the synchronizer */
export const MANAGED_RECORD_TYPE = 'A';
