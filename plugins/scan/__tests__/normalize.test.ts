import { describe, expect, it } from 'vitest';

import { describeOpenPorts, normalizeScanHost, scanHostsToRecords } from '../normalize';

import type { ScanHost } from '../types';

const NOW = new Date('2026-03-02T00:00:00.000Z');

function printerHost(overrides: Partial<ScanHost> = {}): ScanHost {
  return {
    addresses: { ipv4: '10.0.0.50', mac: '00:1b:a9:00:00:50' },
    hostnames: [
      { name: '', type: 'PTR' },
      { name: 'prn-2f.corp.example.test', type: 'PTR' },
    ],
    vendor: { '00:1B:A9:00:00:50': 'Brother Industries' },
    osmatch: [
      { name: 'Brother printer', accuracy: '96' },
      { name: 'Embedded Linux', accuracy: '90' },
    ],
    status: { state: 'up' },
    tcp: {
      '9100': { state: 'open', name: 'jetdirect' },
      '631': { state: 'open', name: 'ipp', product: 'CUPS', version: '2.4' },
      '80': { state: 'open', name: 'http', product: 'Brother HTTPD' },
      '23': { state: 'closed', name: 'telnet' },
    },
    udp: {
      '161': { state: 'open', name: 'snmp' },
      '9999': { state: 'open' },
    },
    ...overrides,
  };
}

describe('scan normalizeScanHost', () => {
  it('maps addresses, OS guess and open services', () => {
    const record = normalizeScanHost(printerHost(), NOW);

    expect(record?.source).toBe('scan');
    expect(record?.observed_at).toBe('2026-03-02T00:00:00.000Z');
    expect(record?.hints).toEqual({
      ip: '10.0.0.50',
      mac: '00:1B:A9:00:00:50',
      hostname: 'prn-2f.corp.example.test',
    });
    expect(record?.attributes).toEqual({
      name: 'prn-2f.corp.example.test',
      manufacturer: 'Brother Industries',
      os_platform: 'Brother printer',
      last_seen_ip: '10.0.0.50',
      mac_addresses: ['00:1B:A9:00:00:50'],
      services: ['http', 'ipp', 'jetdirect', 'snmp'],
      open_ports: [
        '80/tcp/http (Brother HTTPD)',
        '631/tcp/ipp (CUPS 2.4)',
        '9100/tcp/jetdirect',
        '161/udp/snmp',
        '9999/udp/unknown',
      ],
      os_accuracy: 96,
    });
  });

  it('ignores the MAC vendor when no MAC was seen', () => {
    const record = normalizeScanHost(printerHost({ addresses: { ipv4: '10.0.0.50' } }), NOW);
    expect(record?.hints.mac).toBeUndefined();
    expect(record?.attributes.manufacturer).toBeUndefined();
  });

  it('skips hosts that are down or have no IPv4 address', () => {
    expect(normalizeScanHost(printerHost({ status: { state: 'down' } }), NOW)).toBeNull();
    expect(normalizeScanHost(printerHost({ addresses: { mac: '00:1b:a9:00:00:50' } }), NOW)).toBeNull();
  });

  it('uses the scan timestamp when present', () => {
    const record = normalizeScanHost(printerHost({ scanned_at: '2026-03-01T23:00:00Z' }), NOW);
    expect(record?.observed_at).toBe('2026-03-01T23:00:00.000Z');
  });
});

describe('scan helpers', () => {
  it('returns no ports for a host without port tables', () => {
    expect(describeOpenPorts({})).toEqual({ ports: [], services: [] });
  });

  it('reads `{ hosts }` payloads', () => {
    const records = scanHostsToRecords({ hosts: [printerHost(), { addresses: {} }, 'junk'] }, { now: NOW });
    expect(records.map((r) => r.hints.ip)).toEqual(['10.0.0.50']);
  });
});
