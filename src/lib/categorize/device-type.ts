export const DEVICE_TYPES = [
  'Server',
  'Switch',
  'Router',
  'Firewall',
  'Access Point',
  'Printer',
  'Laptop',
  'Desktop',
  'Tablet',
  'Mobile Phone',
  'Virtual Machine',
  'IoT Device',
  'Storage Device',
  'Other Device',
] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

export const FALLBACK_DEVICE_TYPE: DeviceType = 'Other Device';
