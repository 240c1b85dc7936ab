export const SDK_VERSION = '0.1.0';

export function defaultUserAgent(): string {
  return `HelixSdk (${SDK_VERSION}) Node.js/${process.versions.node}`;
}
