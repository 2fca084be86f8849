export type ProxmoxProduct = 'pve' | 'pbs' | 'pmg' | 'pom';

export interface ProductInfo {
  authCookieName: string;
  ticketPrefixes: readonly string[];
  projectText: string;
  shortName: string;
}

export const PRODUCTS: Record<ProxmoxProduct, ProductInfo> = {
  pve: {
    authCookieName: 'PVEAuthCookie',
    ticketPrefixes: ['PVE'],
    projectText: 'Proxmox Virtual Environment',
    shortName: 'PVE',
  },
  pbs: {
    authCookieName: 'PBSAuthCookie',
    ticketPrefixes: ['PBS'],
    projectText: 'Proxmox Backup Server',
    shortName: 'PBS',
  },
  pmg: {
    authCookieName: 'PMGAuthCookie',
    ticketPrefixes: ['PMG', 'PMGQUAR'],
    projectText: 'Proxmox Mail Gateway',
    shortName: 'PMG',
  },
  pom: {
    authCookieName: 'POMAuthCookie',
    ticketPrefixes: ['POM'],
    projectText: 'Proxmox Offline Mirror',
    shortName: 'POM',
  },
};

export function normalizeProduct(value: string | null | undefined): ProxmoxProduct {
  const normalized = (value ?? '').trim().toLowerCase();
  switch (normalized) {
    case 'pve':
    case 'pmg':
    case 'pom':
      return normalized;
    default:
      return 'pbs';
  }
}

// Build-time default (pbs): set VITE_PROXMOX_PRODUCT to pve, pmg or pom.
export const DEFAULT_PRODUCT: ProxmoxProduct = normalizeProduct(import.meta.env.VITE_PROXMOX_PRODUCT);
