/**
 * Station Registry
 *
 * A station is a browser on a physical device, fingerprinted by device id,
 * browser and private-mode flag. Stations are created on first contact and
 * never deleted.
 *
 * @module services/station.service
 */

import type { Station, StationContact } from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";

export class StationService {
  constructor(private readonly store: PosStore) {}

  /**
   * Find the station by fingerprint or create it. Known stations get their
   * IP and last-seen refreshed; MAC is only overwritten when reported.
   */
  async registerStation(
    contact: StationContact,
    now: Date = new Date(),
  ): Promise<Station> {
    const existing = await this.store.findStationByFingerprint(
      contact.deviceId,
      contact.browser,
      contact.isPrivate,
    );

    if (!existing) {
      return this.store.createStation({
        deviceId: contact.deviceId,
        browser: contact.browser,
        isPrivate: contact.isPrivate,
        macAddress: contact.macAddress ?? null,
        ipAddress: contact.ipAddress ?? null,
        firstSeenAt: now,
        lastSeenAt: now,
      });
    }

    const updated = await this.store.updateStation(existing.id, {
      ipAddress: contact.ipAddress ?? existing.ipAddress,
      lastSeenAt: now,
      ...(contact.macAddress ? { macAddress: contact.macAddress } : {}),
    });

    return updated ?? existing;
  }
}
