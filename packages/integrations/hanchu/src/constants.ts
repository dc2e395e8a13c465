export const API_BASE = 'https://iess3.hanchuess.com';

export const API_LOGIN = '/gateway/identify/auth/login/account';
export const API_PARALLEL_POWER_CHART = '/gateway/platform/pcs/parallelPowerChart';
export const API_RACK_DATA = '/gateway/platform/rack/queryRackDataDivisions';
export const API_SET_WORK_MODE = '/gateway/platform/pcs/setWorkMode';

// RSA public key embedded in the vendor web app bundle
export const PUBKEY_PEM = [
  '-----BEGIN PUBLIC KEY-----',
  'MIGfMA0GCSqGSIb3DQEBAQUAA4GNADCBiQKBgQCVg7RFDLMGM4O98d1zWKI5RQan',
  'jci3iY4qlpgsH76fUn3GnZtqjbRk37lCQDv6AhgPNXRPpty81+g909/c4yzySKaP',
  'CcDZv7KdCRB1mVxkq+0z4EtKx9EoTXKnFSDBaYi2srdal1tM3gGOsNTDN58CzYPX',
  'nDGPX7+EHS1Mm4aVDQIDAQAB',
  '-----END PUBLIC KEY-----',
  '',
].join('\n');

// AES-128-CBC, key doubles as IV
export const AES_KEY = '9z64Qr8mZH7Pg8d1';

export const APP_HEADERS: Readonly<Record<string, string>> = {
  accept: 'application/json, text/plain, */*',
  appplat: 'iess',
  origin: 'https://iess3.hanchuess.com',
  referer: 'https://iess3.hanchuess.com/',
};

export const INVERTER_POLL_INTERVAL_SECONDS = 30;
export const BATTERY_POLL_INTERVAL_SECONDS = 60;
export const REQUEST_TIMEOUT_SECONDS = 30;

/** Re-login this long before the token's exp claim */
export const TOKEN_REFRESH_MARGIN_MS = 24 * 60 * 60 * 1000;

// Remote sign conventions relative to ours (grid: + import, battery: - charging)
export const GRID_POWER_SIGN = 1;
export const BATTERY_POWER_SIGN = -1;
