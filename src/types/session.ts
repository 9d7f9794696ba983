export interface SessionData {
  // Anonymous challenge completions as "ch{id}" keys
  challengesCompleted?: string[];
}

export function createInitialSessionData(): SessionData {
  return {};
}

/** Reads session JSON from storage, dropping anything that is not SessionData. */
export function parseSessionData(raw: string): SessionData {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    console.warn("Discarding unreadable session data:", error);
    return createInitialSessionData();
  }

  const data = createInitialSessionData();
  if (typeof value === "object" && value !== null && "challengesCompleted" in value) {
    const completed = value.challengesCompleted;
    if (Array.isArray(completed)) {
      data.challengesCompleted = completed.filter((key): key is string => typeof key === "string");
    }
  }
  return data;
}
