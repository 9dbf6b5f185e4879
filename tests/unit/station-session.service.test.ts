/**
 * Station Session Service Unit Tests
 *
 * | Test ID   | Requirement                                        |
 * |-----------|----------------------------------------------------|
 * | SS-U-001  | exact line ability permits the line                |
 * | SS-U-002  | line:* permits any line                            |
 * | SS-U-003  | unrelated ability denies                           |
 * | SS-U-004  | createSession registers station, hashes token      |
 * | SS-U-005  | logging in again abandons the user's old sessions  |
 * | SS-U-006  | resolve touches last activity                      |
 * | SS-U-007  | resolve rejects unknown and non-active tokens      |
 * | SS-U-008  | idle sessions are abandoned on lookup              |
 * | SS-U-009  | revoke abandons and closes                         |
 * | SS-U-010  | sync status reporting rules                        |
 * | SS-U-011  | station registry refreshes contact details         |
 *
 * @test-level Unit
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  assertLineAbilities,
  canActOnLine,
  generateSessionToken,
  hashSessionToken,
  hasAbility,
  LinePermissionError,
  SessionAccessError,
  StationSessionService,
} from "../../src/services/station-session.service";
import { SessionStateError } from "../../src/services/session-state-machine";
import { StationService } from "../../src/services/station.service";
import { MemoryPosStore } from "../utils/memory-store";
import { createTestSession, TEST_NOW, testSyncConfig } from "../utils/fixtures";

describe("Line abilities", () => {
  it("SS-U-001: exact ability permits only that line", () => {
    const session = { abilities: ["line:L10"] };
    expect(canActOnLine(session, { mealType: "L", lineNum: 10 })).toBe(true);
    expect(canActOnLine(session, { mealType: "B", lineNum: 5 })).toBe(false);
    expect(canActOnLine(session, { mealType: "L", lineNum: 1 })).toBe(false);
  });

  it("SS-U-002: line:* permits any line", () => {
    const session = { abilities: ["line:*"] };
    expect(canActOnLine(session, { mealType: "B", lineNum: 5 })).toBe(true);
    expect(canActOnLine(session, { mealType: "L", lineNum: 10 })).toBe(true);
  });

  it("SS-U-002b: wildcard matches on the prefix before the star", () => {
    expect(hasAbility(["line:L1:*"], "line:L1:extra")).toBe(true);
    expect(hasAbility(["*"], "line:L10")).toBe(false);
    expect(hasAbility(["report:*"], "line:L10")).toBe(false);
  });

  it("SS-U-003: no abilities denies", () => {
    expect(canActOnLine({ abilities: [] }, { mealType: "L", lineNum: 10 })).toBe(
      false,
    );
  });

  it("assertLineAbilities names every denied line once", () => {
    expect(() =>
      assertLineAbilities({ abilities: ["line:L10"] }, [
        { mealType: "L", lineNum: 10 },
        { mealType: "B", lineNum: 5 },
        { mealType: "B", lineNum: 5 },
        { mealType: "L", lineNum: 2 },
      ]),
    ).toThrow(
      new LinePermissionError({ lines: ["B5", "L2"] }),
    );
  });
});

describe("Session tokens", () => {
  it("generates 64 hex characters", () => {
    expect(generateSessionToken()).toMatch(/^[0-9a-f]{64}$/);
  });

  it("hashes with SHA-256", () => {
    expect(hashSessionToken("test-token")).toMatch(/^[0-9a-f]{64}$/);
    expect(hashSessionToken("test-token")).toBe(hashSessionToken("test-token"));
    expect(hashSessionToken("test-token")).not.toBe("test-token");
  });
});

describe("StationSessionService", () => {
  let store: MemoryPosStore;
  let service: StationSessionService;

  beforeEach(() => {
    store = new MemoryPosStore();
    service = new StationSessionService(store, testSyncConfig);
  });

  it("SS-U-004: creates the station and stores only the token hash", async () => {
    const created = await service.createSession(
      {
        station: { deviceId: "dev-9", browser: "firefox", isPrivate: true },
        userId: 11,
        abilities: ["line:L10"],
      },
      TEST_NOW,
    );

    expect(created.station.deviceId).toBe("dev-9");
    expect(created.session).toMatchObject({
      stationId: created.station.id,
      userId: 11,
      username: null,
      lineLogId: null,
      status: "active",
      abilities: ["line:L10"],
      openedAt: TEST_NOW,
      lastActivityAt: TEST_NOW,
      closedAt: null,
    });
    expect(created.session.tokenHash).toBe(hashSessionToken(created.token));
    expect(store.tables.sessions[0].tokenHash).not.toBe(created.token);
    expect(created.revokedSessions).toBe(0);
  });

  it("SS-U-005: logging in again abandons the user's other active sessions", async () => {
    const first = await createTestSession(store, { userId: 5 });
    const second = await createTestSession(store, {
      userId: 5,
      deviceId: "device-2",
    });

    const old = await store.findSession(first.session.id);
    expect(old?.status).toBe("abandoned");
    expect(old?.closedAt).toEqual(TEST_NOW);
    expect(await service.resolve(first.token, TEST_NOW)).toBeUndefined();
    expect((await service.resolve(second.token, TEST_NOW))?.id).toBe(
      second.session.id,
    );
  });

  it("SS-U-006: resolving a token refreshes last activity", async () => {
    const { session, token } = await createTestSession(store);
    const later = new Date(TEST_NOW.getTime() + 60_000);

    const resolved = await service.resolve(token, later);

    expect(resolved?.id).toBe(session.id);
    expect(resolved?.lastActivityAt).toEqual(later);
  });

  it("SS-U-007: unknown, empty and finished tokens do not resolve", async () => {
    const { session, token } = await createTestSession(store);
    expect(await service.resolve("", TEST_NOW)).toBeUndefined();
    expect(await service.resolve("not-a-token", TEST_NOW)).toBeUndefined();

    await store.updateSession(session.id, { status: "syncing" });
    expect(await service.resolve(token, TEST_NOW)).toBeUndefined();
  });

  it("SS-U-008: a session idle past the timeout is abandoned on lookup", async () => {
    // GIVEN: A session last used at TEST_NOW
    const { session, token } = await createTestSession(store);

    // WHEN: The token is presented after the idle timeout
    const expiredAt = new Date(
      TEST_NOW.getTime() +
        (testSyncConfig.sessionIdleTimeoutMinutes + 1) * 60_000,
    );
    const resolved = await service.resolve(token, expiredAt);

    // THEN: It no longer authenticates and is marked abandoned
    expect(resolved).toBeUndefined();
    const stored = await store.findSession(session.id);
    expect(stored?.status).toBe("abandoned");
    expect(stored?.closedAt).toEqual(expiredAt);
    expect(console.warn).toHaveBeenCalledWith(
      "[StationSession] Session expired after inactivity",
      expect.objectContaining({ sessionId: session.id }),
    );
  });

  it("SS-U-008b: a session exactly at the timeout still resolves", async () => {
    const { token } = await createTestSession(store);
    const boundary = new Date(
      TEST_NOW.getTime() + testSyncConfig.sessionIdleTimeoutMinutes * 60_000,
    );
    expect(await service.resolve(token, boundary)).toBeDefined();
  });

  it("SS-U-009: revoke abandons and closes the session", async () => {
    const { session, token } = await createTestSession(store);
    const at = new Date("2026-03-02T19:00:00Z");

    const revoked = await service.revoke(session, at);

    expect(revoked.status).toBe("abandoned");
    expect(revoked.closedAt).toEqual(at);
    expect(await service.resolve(token, at)).toBeUndefined();
  });

  describe("SS-U-010: reportSyncStatus", () => {
    it("moves an earlier session of the same station to syncing then synced", async () => {
      const earlier = await createTestSession(store, { userId: 1 });
      const current = await createTestSession(store, { userId: 2 });

      const syncing = await service.reportSyncStatus(
        current.session,
        earlier.session.id,
        "syncing",
        TEST_NOW,
      );
      expect(syncing.status).toBe("syncing");
      expect(syncing.closedAt).toBeNull();

      const doneAt = new Date("2026-03-02T18:00:00Z");
      const synced = await service.reportSyncStatus(
        current.session,
        earlier.session.id,
        "synced",
        doneAt,
      );
      expect(synced.status).toBe("synced");
      expect(synced.closedAt).toEqual(doneAt);
    });

    it("keeps the original close time of an abandoned session", async () => {
      const earlier = await createTestSession(store, { userId: 1 });
      await createTestSession(store, { userId: 1, deviceId: "device-1" });
      const current = await createTestSession(store, { userId: 2 });

      const synced = await service.reportSyncStatus(
        current.session,
        earlier.session.id,
        "synced",
        new Date("2026-03-02T20:00:00Z"),
      );

      expect(synced.status).toBe("synced");
      expect(synced.closedAt).toEqual(TEST_NOW);
    });

    it("repeating the current status is a no-op", async () => {
      const earlier = await createTestSession(store, { userId: 1 });
      const current = await createTestSession(store, { userId: 2 });
      await service.reportSyncStatus(current.session, earlier.session.id, "syncing");

      const again = await service.reportSyncStatus(
        current.session,
        earlier.session.id,
        "syncing",
      );
      expect(again.status).toBe("syncing");
    });

    it("rejects reopening a synced session", async () => {
      const earlier = await createTestSession(store, { userId: 1 });
      const current = await createTestSession(store, { userId: 2 });
      await service.reportSyncStatus(current.session, earlier.session.id, "synced");

      await expect(
        service.reportSyncStatus(current.session, earlier.session.id, "syncing"),
      ).rejects.toBeInstanceOf(SessionStateError);
    });

    it("rejects a session targeting itself", async () => {
      const current = await createTestSession(store);

      await expect(
        service.reportSyncStatus(current.session, current.session.id, "syncing"),
      ).rejects.toMatchObject({
        code: "INVALID_SESSION_TRANSITION",
        details: { sessionId: current.session.id, from: "active", to: "syncing" },
      });
    });

    it("rejects sessions of another station", async () => {
      const other = await createTestSession(store, {
        userId: 1,
        deviceId: "device-other",
      });
      const current = await createTestSession(store, { userId: 2 });

      await expect(
        service.reportSyncStatus(current.session, other.session.id, "synced"),
      ).rejects.toSatisfy(
        (error: unknown) =>
          error instanceof SessionAccessError &&
          error.code === "STATION_MISMATCH" &&
          error.message === "Session belongs to a different station",
      );
    });

    it("rejects unknown sessions", async () => {
      const current = await createTestSession(store);

      await expect(
        service.reportSyncStatus(current.session, 4040, "synced"),
      ).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
        message: "Session 4040 not found",
      });
    });
  });
});

describe("StationService", () => {
  it("SS-U-011: refreshes IP and last seen, MAC only when reported", async () => {
    const store = new MemoryPosStore();
    const stations = new StationService(store);
    const contact = { deviceId: "d1", browser: "chrome", isPrivate: false };

    const created = await stations.registerStation(
      { ...contact, macAddress: "AA:BB", ipAddress: "10.0.0.5" },
      TEST_NOW,
    );
    const later = new Date("2026-03-03T12:00:00Z");
    const updated = await stations.registerStation(
      { ...contact, ipAddress: "10.0.0.9" },
      later,
    );

    expect(updated.id).toBe(created.id);
    expect(updated).toMatchObject({
      macAddress: "AA:BB",
      ipAddress: "10.0.0.9",
      firstSeenAt: TEST_NOW,
      lastSeenAt: later,
    });
    expect(store.tables.stations).toHaveLength(1);
  });

  it("treats a private window as a different station", async () => {
    const store = new MemoryPosStore();
    const stations = new StationService(store);

    const normal = await stations.registerStation(
      { deviceId: "d1", browser: "chrome", isPrivate: false },
      TEST_NOW,
    );
    const incognito = await stations.registerStation(
      { deviceId: "d1", browser: "chrome", isPrivate: true },
      TEST_NOW,
    );

    expect(incognito.id).not.toBe(normal.id);
  });
});
