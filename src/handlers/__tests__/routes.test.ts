import { describe, it, expect, beforeAll, beforeEach, afterAll, afterEach, vi } from "vitest";
import type { LightMyRequestResponse } from "fastify";
import { createApp } from "../../app";
import { SESSION_COOKIE } from "../../middleware";
import { centerService, completionService, deviceService, reconcileService, sessionService } from "../../services";
import { createTestChallenge, resetTestDatabase } from "../../test/db";

const app = createApp();

function sessionCookie(response: LightMyRequestResponse): string | undefined {
  const cookie = response.cookies.find((entry) => entry.name === SESSION_COOKIE);
  return cookie ? `${cookie.name}=${cookie.value}` : undefined;
}

function sessionToken(response: LightMyRequestResponse): string {
  const cookie = response.cookies.find((entry) => entry.name === SESSION_COOKIE);
  if (!cookie) throw new Error("response set no session cookie");
  return decodeURIComponent(cookie.value);
}

const account = {
  username: "rivertest",
  email: "river@example.com",
  firstName: "River",
  password: "test-password",
  confirmPassword: "test-password",
};

beforeAll(async () => {
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

beforeEach(async () => {
  await resetTestDatabase();
});

describe("challenge completion across login", () => {
  it("carries anonymous completions into the account", async () => {
    const phone = await createTestChallenge("Recycle a phone", { co2Saved: 1, order: 1 });
    const battery = await createTestChallenge("Return a battery", { co2Saved: 0.5, order: 2 });
    await createTestChallenge("Repair a laptop", { co2Saved: 2, order: 3 });

    const board = await app.inject({ method: "GET", url: "/challenges" });
    expect(board.statusCode).toBe(200);
    expect(board.json()).toMatchObject({ completed: [], progress: 0, badge: null });
    expect(board.json().challenges).toHaveLength(3);
    expect(sessionCookie(board)).toBeUndefined();

    const firstDone = await app.inject({
      method: "POST",
      url: "/challenges/complete",
      payload: { challengeId: `ch${phone.id}` },
    });
    expect(firstDone.statusCode).toBe(200);
    const cookie = sessionCookie(firstDone);
    expect(cookie).toBeDefined();
    expect(firstDone.json()).toMatchObject({
      created: true,
      message: "Challenge completed: Recycle a phone!",
      completed: [`ch${phone.id}`],
    });

    const secondDone = await app.inject({
      method: "POST",
      url: "/challenges/complete",
      headers: { cookie },
      payload: { challengeId: `ch${battery.id}` },
    });
    expect(secondDone.json().completed).toEqual([`ch${phone.id}`, `ch${battery.id}`]);
    expect(sessionCookie(secondDone)).toBeUndefined();

    const registered = await app.inject({ method: "POST", url: "/auth/register", payload: account });
    expect(registered.statusCode).toBe(201);

    const login = await app.inject({
      method: "POST",
      url: "/auth/login",
      headers: { cookie },
      payload: { username: account.username, password: account.password },
    });
    expect(login.statusCode).toBe(200);
    expect(login.json()).toMatchObject({
      mergedCount: 2,
      message: "We saved 2 challenges from your previous session.",
      welcome: "Welcome back, River!",
    });
    const userCookie = sessionCookie(login);
    expect(userCookie).toBeDefined();
    expect(userCookie).not.toBe(cookie);

    const userBoard = await app.inject({ method: "GET", url: "/challenges", headers: { cookie: userCookie } });
    expect(userBoard.json().completed.sort()).toEqual([`ch${phone.id}`, `ch${battery.id}`].sort());
    expect(userBoard.json()).toMatchObject({
      totalCo2: 1.5,
      completedCount: 2,
      progress: 66,
      badge: { icon: "🌱", name: "Eco Starter" },
    });

    // The old anonymous cookie no longer points at a session
    const staleBoard = await app.inject({ method: "GET", url: "/challenges", headers: { cookie } });
    expect(staleBoard.json().completed).toEqual([]);

    const logout = await app.inject({ method: "POST", url: "/auth/logout", headers: { cookie: userCookie } });
    expect(logout.statusCode).toBe(200);

    const relogin = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { username: account.username, password: account.password },
    });
    expect(relogin.json()).toMatchObject({ mergedCount: 0, message: null });
  });

  it("stores completions directly for a signed-in user", async () => {
    const phone = await createTestChallenge("Recycle a phone");
    await app.inject({ method: "POST", url: "/auth/register", payload: account });
    const login = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { username: account.username, password: account.password },
    });
    const cookie = sessionCookie(login);

    const done = await app.inject({
      method: "POST",
      url: "/challenges/complete",
      headers: { cookie },
      payload: { challengeId: `ch${phone.id}` },
    });
    const repeat = await app.inject({
      method: "POST",
      url: "/challenges/complete",
      headers: { cookie },
      payload: { challengeId: `ch${phone.id}` },
    });

    expect(done.json()).toMatchObject({ created: true, completed: [`ch${phone.id}`] });
    expect(repeat.json()).toMatchObject({ created: false, completed: [`ch${phone.id}`] });

    const profile = await app.inject({ method: "GET", url: "/profile", headers: { cookie } });
    expect(profile.json()).toMatchObject({ completedChallenges: 1, balance: 0 });
  });

  it("rejects malformed and unknown challenge ids", async () => {
    const malformed = await app.inject({
      method: "POST",
      url: "/challenges/complete",
      payload: { challengeId: "phone" },
    });
    const unknown = await app.inject({
      method: "POST",
      url: "/challenges/complete",
      payload: { challengeId: "ch4242" },
    });

    expect(malformed.statusCode).toBe(400);
    expect(malformed.json().error).toBe("malformed_key");
    expect(unknown.statusCode).toBe(404);
  });
});

describe("login when storing completions fails", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function completeAnonymously(challengeIds: number[]) {
    let cookie: string | undefined;
    for (const id of challengeIds) {
      const response = await app.inject({
        method: "POST",
        url: "/challenges/complete",
        headers: cookie ? { cookie } : {},
        payload: { challengeId: `ch${id}` },
      });
      cookie = cookie ?? sessionCookie(response);
    }
    if (!cookie) throw new Error("no anonymous session was created");
    return cookie;
  }

  function logIn(username: string, cookie?: string) {
    return app.inject({
      method: "POST",
      url: "/auth/login",
      headers: cookie ? { cookie } : {},
      payload: { username, password: account.password },
    });
  }

  it("still logs in and keeps only the keys whose write failed", async () => {
    const phone = await createTestChallenge("Recycle a phone", { order: 1 });
    const battery = await createTestChallenge("Return a battery", { order: 2 });
    const cookie = await completeAnonymously([phone.id, battery.id]);
    await app.inject({ method: "POST", url: "/auth/register", payload: account });

    const insert = vi.spyOn(completionService, "createIfAbsent").mockRejectedValueOnce(new Error("disk I/O error"));
    const login = await logIn(account.username, cookie);

    expect(insert).toHaveBeenCalledTimes(2);
    expect(login.statusCode).toBe(200);
    expect(login.json()).toMatchObject({
      mergedCount: 1,
      message: "We saved 1 challenge from your previous session.",
    });
    expect((await sessionService.load(sessionToken(login)))?.data).toEqual({
      challengesCompleted: [`ch${phone.id}`],
    });

    insert.mockRestore();
    const userCookie = sessionCookie(login);
    const board = await app.inject({ method: "GET", url: "/challenges", headers: { cookie: userCookie } });

    expect(board.json().completed.sort()).toEqual([`ch${phone.id}`, `ch${battery.id}`].sort());
    expect((await sessionService.load(sessionToken(login)))?.data).toEqual({});
  });

  it("still logs in when the merge itself throws", async () => {
    const phone = await createTestChallenge("Recycle a phone", { order: 1 });
    const battery = await createTestChallenge("Return a battery", { order: 2 });
    const cookie = await completeAnonymously([phone.id, battery.id]);
    await app.inject({ method: "POST", url: "/auth/register", payload: account });

    const reconcile = vi.spyOn(reconcileService, "reconcile").mockRejectedValueOnce(new Error("database is locked"));
    const login = await logIn(account.username, cookie);

    expect(reconcile).toHaveBeenCalledTimes(1);
    expect(login.statusCode).toBe(200);
    expect(login.json()).toMatchObject({ mergedCount: 0, message: null });
    expect((await sessionService.load(sessionToken(login)))?.data).toEqual({
      challengesCompleted: [`ch${phone.id}`, `ch${battery.id}`],
    });

    reconcile.mockRestore();
    const board = await app.inject({ method: "GET", url: "/challenges", headers: { cookie: sessionCookie(login) } });

    expect(board.json()).toMatchObject({ completedCount: 2 });
    expect((await sessionService.load(sessionToken(login)))?.data).toEqual({});
  });

  it("does not hand one account's pending keys to the next account on the same browser", async () => {
    const phone = await createTestChallenge("Recycle a phone");
    const cookie = await completeAnonymously([phone.id]);
    await app.inject({ method: "POST", url: "/auth/register", payload: account });
    await app.inject({
      method: "POST",
      url: "/auth/register",
      payload: { ...account, username: "bobbytest", email: "bobby@example.com", firstName: "Bobby" },
    });

    vi.spyOn(completionService, "createIfAbsent").mockRejectedValueOnce(new Error("disk I/O error"));
    const riverLogin = await logIn(account.username, cookie);
    expect(riverLogin.json().mergedCount).toBe(0);

    const bobbyLogin = await logIn("bobbytest", sessionCookie(riverLogin));
    const bobbyBoard = await app.inject({
      method: "GET",
      url: "/challenges",
      headers: { cookie: sessionCookie(bobbyLogin) },
    });

    expect(bobbyLogin.statusCode).toBe(200);
    expect(bobbyLogin.json().mergedCount).toBe(0);
    expect(bobbyBoard.json().completed).toEqual([]);
    expect((await sessionService.load(sessionToken(bobbyLogin)))?.data).toEqual({});
  });
});

describe("auth routes", () => {
  it("rejects mismatched password confirmation", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/auth/register",
      payload: { ...account, confirmPassword: "something-else" },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().details.fieldErrors.confirmPassword).toEqual(["Passwords do not match."]);
  });

  it("answers 401 for bad credentials", async () => {
    await app.inject({ method: "POST", url: "/auth/register", payload: account });

    const response = await app.inject({
      method: "POST",
      url: "/auth/login",
      payload: { username: account.username, password: "wrong-password" },
    });

    expect(response.statusCode).toBe(401);
  });

  it("keeps the profile behind login", async () => {
    const response = await app.inject({ method: "GET", url: "/profile" });
    expect(response.statusCode).toBe(401);
  });
});

describe("pickups", () => {
  const pickup = {
    name: "Asha",
    email: "asha@example.com",
    phone: "555-0100",
    address: "12 Green Lane",
    wasteType: "Laptops",
    driveType: "community_drive",
    pickupDate: "2026-11-02",
    pickupTime: "10:30",
  };

  it("books a pickup", async () => {
    const response = await app.inject({ method: "POST", url: "/pickups", payload: pickup });

    expect(response.statusCode).toBe(201);
    expect(response.json().pickup).toMatchObject({ name: "Asha", driveType: "community_drive" });
  });

  it("rejects an unknown drive type and a bad time", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/pickups",
      payload: { ...pickup, driveType: "helicopter", pickupTime: "25:00" },
    });

    expect(response.statusCode).toBe(400);
    expect(Object.keys(response.json().details.fieldErrors).sort()).toEqual(["driveType", "pickupTime"]);
  });
});

describe("centers and credits", () => {
  it("searches centers near a point", async () => {
    await centerService.create({ name: "Lakeside Drop-off", address: "1 Lake St", latitude: 12.97, longitude: 77.59 });

    const nearby = await app.inject({ method: "GET", url: "/centers/nearby?lat=12.98&lng=77.59&radius_km=3" });
    const missing = await app.inject({ method: "GET", url: "/centers/nearby?lng=77.59" });

    expect(nearby.json().centers.map((center: { name: string }) => center.name)).toEqual(["Lakeside Drop-off"]);
    expect(missing.statusCode).toBe(400);
  });

  it("shows points to anonymous visitors without saving them", async () => {
    await deviceService.create({ modelName: "Pixel 4a", metalValue: 10.2 });

    const response = await app.inject({ method: "POST", url: "/credits", payload: { deviceModel: "pixel 4a" } });
    const unknown = await app.inject({ method: "POST", url: "/credits", payload: { deviceModel: "Nokia 3310" } });

    expect(response.json()).toMatchObject({
      pointsAwarded: 102,
      saved: false,
      balance: null,
      message: "Login to save your points.",
    });
    expect(unknown.statusCode).toBe(404);
  });
});

describe("insights", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the AI explanation for a component", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(JSON.stringify({ choices: [{ message: { content: "Mercury poisons water." } }] }), {
            status: 200,
          })
      )
    );

    const response = await app.inject({ method: "POST", url: "/hazard", payload: { topic: "mercury" } });

    expect(response.json()).toEqual({ component: "mercury", explanation: "Mercury poisons water." });
  });

  it("asks for a topic", async () => {
    const response = await app.inject({ method: "POST", url: "/education", payload: { topic: "  " } });
    expect(response.statusCode).toBe(400);
  });
});

describe("tools", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function stubReply(content: string) {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 }))
    );
  }

  it("scores a submitted quiz", async () => {
    const question = {
      question: "Where should a dead phone go?",
      options: [
        { label: "A", text: "Bin" },
        { label: "B", text: "River" },
        { label: "C", text: "Certified recycler" },
        { label: "D", text: "Fire" },
      ],
      answer: "C",
    };

    const response = await app.inject({
      method: "POST",
      url: "/quiz/score",
      payload: { questions: [question, { ...question, answer: "A" }], answers: ["C", "B"] },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ score: 1, total: 2 });
  });

  it("rejects an answer outside A to D", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/quiz/score",
      payload: { questions: [], answers: ["E"] },
    });

    expect(response.statusCode).toBe(400);
  });

  it("recommends an action for a used device", async () => {
    stubReply("RECOMMENDATION: Donate\nA school can still use it.");

    const response = await app.inject({
      method: "POST",
      url: "/reuse",
      payload: { model: "Dell laptop", condition: "Working", age: 4 },
    });

    expect(response.json()).toEqual({
      recommendation: "Donate",
      reasoning: "A school can still use it.",
      needsLocation: true,
    });
  });

  it("needs an item to decide on", async () => {
    const response = await app.inject({ method: "POST", url: "/decision", payload: { item: "" } });
    expect(response.statusCode).toBe(400);
  });
});

describe("collectors", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("filters collectors and adds the insight", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(JSON.stringify({ choices: [{ message: { content: "Most e-waste is handled informally." } }] }), {
            status: 200,
          })
      )
    );

    const response = await app.inject({ method: "GET", url: "/collectors?city=Pune&verified_only=on" });

    expect(response.json()).toMatchObject({
      collectors: [],
      selectedCity: "Pune",
      verifiedOnly: true,
      insight: "Most e-waste is handled informally.",
    });
  });

  it("takes a nomination", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/collectors/nominations",
      payload: { nomineeName: "Ravi Scrap", nomineeCity: "Jaipur", nomineePhone: "555-0101" },
    });
    const missingCity = await app.inject({
      method: "POST",
      url: "/collectors/nominations",
      payload: { nomineeName: "Ravi Scrap" },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().message).toBe("Thank you for nominating Ravi Scrap! We'll review and add them if verified.");
    expect(missingCity.statusCode).toBe(400);
  });
});

describe("health", () => {
  it("reports ok", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.json()).toEqual({ ok: true });
  });
});
