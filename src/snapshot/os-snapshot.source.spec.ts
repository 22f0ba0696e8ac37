import { NetworkInterfaceInfo } from 'os';
import { buildSnapshot } from './os-snapshot.source';

const loopback4: NetworkInterfaceInfo = {
  address: '127.0.0.1',
  netmask: '255.0.0.0',
  family: 'IPv4',
  mac: '00:00:00:00:00:00',
  internal: true,
  cidr: '127.0.0.1/8',
};

const eth0v4: NetworkInterfaceInfo = {
  address: '192.168.1.20',
  netmask: '255.255.255.0',
  family: 'IPv4',
  mac: '02:00:00:00:00:01',
  internal: false,
  cidr: '192.168.1.20/24',
};

const eth0Global: NetworkInterfaceInfo = {
  address: '2001:db8::1',
  netmask: 'ffff:ffff:ffff:ffff::',
  family: 'IPv6',
  mac: '02:00:00:00:00:01',
  internal: false,
  cidr: '2001:db8::1/64',
  scopeid: 0,
};

const eth0LinkLocal: NetworkInterfaceInfo = {
  address: 'fe80::1',
  netmask: 'ffff:ffff:ffff:ffff::',
  family: 'IPv6',
  mac: '02:00:00:00:00:01',
  internal: false,
  cidr: 'fe80::1/64',
  scopeid: 2,
};

describe('buildSnapshot', () => {
  it('should group addresses by family in OS order', () => {
    const snapshot = buildSnapshot({ eth0: [eth0Global, eth0v4, eth0LinkLocal] });

    expect(snapshot).toEqual({
      eth0: {
        IPv4: [
          {
            address: '192.168.1.20',
            netmask: '255.255.255.0',
            cidr: '192.168.1.20/24',
            mac: '02:00:00:00:00:01',
            internal: false,
          },
        ],
        IPv6: [
          {
            address: '2001:db8::1',
            netmask: 'ffff:ffff:ffff:ffff::',
            cidr: '2001:db8::1/64',
            mac: '02:00:00:00:00:01',
            internal: false,
            scopeid: 0,
          },
          {
            address: 'fe80::1',
            netmask: 'ffff:ffff:ffff:ffff::',
            cidr: 'fe80::1/64',
            mac: '02:00:00:00:00:01',
            internal: false,
            scopeid: 2,
          },
        ],
      },
    });
  });

  it('should omit families an interface has no address for', () => {
    const snapshot = buildSnapshot({ lo: [loopback4] });

    expect(Object.keys(snapshot.lo ?? {})).toEqual(['IPv4']);
  });

  it('should keep interfaces that report no addresses', () => {
    expect(buildSnapshot({ wg0: [], eth1: undefined })).toEqual({ eth1: {}, wg0: {} });
  });

  it('should freeze the snapshot and its records', () => {
    const snapshot = buildSnapshot({ eth0: [eth0Global] });

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.eth0)).toBe(true);
    expect(Object.isFrozen(snapshot.eth0?.IPv6)).toBe(true);
    expect(Object.isFrozen(snapshot.eth0?.IPv6?.[0])).toBe(true);
  });

  it('should produce a new object on every call', () => {
    const table = { eth0: [eth0Global] };

    expect(buildSnapshot(table)).not.toBe(buildSnapshot(table));
  });
});
