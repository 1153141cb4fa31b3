/** Subset of a Graph-style `managedDevice` the adapter reads; every field is optional on the wire. */
export type ManagedDevice = {
  id?: string | null;
  deviceName?: string | null;
  serialNumber?: string | null;
  manufacturer?: string | null;
  model?: string | null;
  operatingSystem?: string | null;
  osVersion?: string | null;
  wiFiMacAddress?: string | null;
  ethernetMacAddress?: string | null;
  azureADDeviceId?: string | null;
  userPrincipalName?: string | null;
  userDisplayName?: string | null;
  complianceState?: string | null;
  managedDeviceOwnerType?: string | null;
  imei?: string | null;
  phoneNumber?: string | null;
  isEncrypted?: boolean | null;
  isSupervised?: boolean | null;
  totalStorageSpaceInBytes?: number | null;
  freeStorageSpaceInBytes?: number | null;
  physicalMemoryInBytes?: number | null;
  enrolledDateTime?: string | null;
  lastSyncDateTime?: string | null;
};

export type ManagedDevicePage = {
  value?: unknown[];
  '@odata.nextLink'?: string | null;
};
