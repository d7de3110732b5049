/* src/installer/catalog.ts
 * Known backports, reported by list_backports. Static for now; discovery from
 * a remote index would replace this table.
 */

export type CatalogEntry = {
  version: string;
  platform: string;
  url: string;
  description: string;
  features: string[];
};

export const KNOWN_BACKPORTS: readonly CatalogEntry[] = [
  {
    version: '1.42.8',
    platform: 'ubuntu-22.04',
    url: 'https://storage.googleapis.com/packages.viam.com/ubuntu/jammy-nm-backports.tar',
    description: 'NetworkManager 1.42.8 backport for Ubuntu 22.04 (Jammy)',
    features: ['scanning-in-ap-mode'],
  },
];
