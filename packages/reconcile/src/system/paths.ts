import { join, relative } from 'node:path';

/** Locations of the system files the adapters read and write. */
export interface SystemPaths {
  /** Directory every other path is resolved under */
  root: string;
  hostname: string;
  hosts: string;
  wpaSupplicant: string;
  /** `up` or `down`, persisted across reboots */
  wifiState: string;
  netClass: string;
  leds: string;
  /** KEY=VALUE file read at boot to restore the LED trigger */
  bootState: string;
  /** KEY=VALUE board overlay file holding bus status and speed */
  boardConfig: string;
}

/**
 * Resolve every system path under `root`. Tests point `root` at a
 * scratch directory.
 */
export function resolveSystemPaths(root = '/'): SystemPaths {
  return {
    root,
    hostname: join(root, 'etc', 'hostname'),
    hosts: join(root, 'etc', 'hosts'),
    wpaSupplicant: join(root, 'etc', 'wpa_supplicant', 'wpa_supplicant.conf'),
    wifiState: join(root, 'etc', 'wifi_state.txt'),
    netClass: join(root, 'sys', 'class', 'net'),
    leds: join(root, 'sys', 'class', 'leds'),
    bootState: join(root, 'etc', 'nodeconf', 'boot.conf'),
    boardConfig: join(root, 'etc', 'luckfox.cfg'),
  };
}

/** Show a resolved path as it appears on the device. */
export function displayPath(paths: SystemPaths, filePath: string): string {
  return `/${relative(paths.root, filePath)}`;
}
