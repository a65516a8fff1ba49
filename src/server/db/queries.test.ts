import { describe, it, expect, beforeEach } from "vitest";
import { createMockDb, mockConnection, mockUser, type MockDb } from "../../test/mocks/db";
import { spotifyConnections, users } from "./schema";
import {
  createUser,
  deleteSpotifyConnection,
  findSpotifyConnection,
  findUserByEmail,
  updateRefreshToken,
  upsertSpotifyConnection,
} from "./queries";

let mockDb: MockDb;

beforeEach(() => {
  mockDb = createMockDb({ user: mockUser, connection: mockConnection, insertData: [{ id: mockUser.id }] });
});

describe("user queries", () => {
  it("finds a user by email", async () => {
    const user = await findUserByEmail(mockDb as never, "test@example.com");

    expect(user).toEqual(mockUser);
    expect(mockDb.query.users.findFirst).toHaveBeenCalledWith({ where: expect.anything() });
  });

  it("returns undefined for an unknown user", async () => {
    mockDb = createMockDb();
    expect(await findUserByEmail(mockDb as never, "nobody@example.com")).toBeUndefined();
  });

  it("creates a user and returns its id", async () => {
    const created = await createUser(mockDb as never, "new@example.com", "hash");

    expect(created).toEqual({ id: mockUser.id });
    expect(mockDb.insert).toHaveBeenCalledWith(users);
    expect(mockDb._lastInsertChain?.values).toHaveBeenCalledWith({
      email: "new@example.com",
      passwordHash: "hash",
    });
    expect(mockDb._lastInsertChain?.onConflictDoNothing).toHaveBeenCalledWith({ target: users.email });
  });

  it("returns null when the email is already taken", async () => {
    mockDb = createMockDb({ insertData: [] });
    expect(await createUser(mockDb as never, "test@example.com", "hash")).toBeNull();
  });
});

describe("Spotify connection queries", () => {
  it("finds the connection of a user", async () => {
    expect(await findSpotifyConnection(mockDb as never, mockUser.id)).toEqual(mockConnection);
  });

  it("upserts the connection keyed by user", async () => {
    await upsertSpotifyConnection(mockDb as never, {
      userId: mockUser.id,
      spotifyId: "spotify_user_1",
      displayName: "Test User",
      refreshToken: "new_refresh_token",
      scope: "user-top-read",
    });

    expect(mockDb.insert).toHaveBeenCalledWith(spotifyConnections);
    expect(mockDb._lastInsertChain?.values).toHaveBeenCalledWith(
      expect.objectContaining({ userId: mockUser.id, refreshToken: "new_refresh_token", updatedAt: expect.any(Date) }),
    );
    expect(mockDb._lastInsertChain?.onConflictDoUpdate).toHaveBeenCalledWith({
      target: spotifyConnections.userId,
      set: expect.objectContaining({ spotifyId: "spotify_user_1", refreshToken: "new_refresh_token" }),
    });
  });

  it("stores a rotated refresh token", async () => {
    await updateRefreshToken(mockDb as never, mockUser.id, "rotated_token");

    expect(mockDb.update).toHaveBeenCalledWith(spotifyConnections);
    expect(mockDb._lastUpdateChain?.set).toHaveBeenCalledWith(
      expect.objectContaining({ refreshToken: "rotated_token", updatedAt: expect.any(Date) }),
    );
    expect(mockDb._lastUpdateChain?.where).toHaveBeenCalledTimes(1);
  });

  it("deletes the connection", async () => {
    await deleteSpotifyConnection(mockDb as never, mockUser.id);

    expect(mockDb.delete).toHaveBeenCalledWith(spotifyConnections);
    expect(mockDb._lastDeleteChain?.where).toHaveBeenCalledTimes(1);
  });
});
