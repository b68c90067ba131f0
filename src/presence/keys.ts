export const PRESENCE_PREFIX = "presence.";

export const presenceKey = (clientId: string) => `${PRESENCE_PREFIX}${clientId}`;

/** Client id behind a presence key, or `null` for keys outside the presence domain. */
export const clientIdFromKey = (key: string): string | null => {
  if (!key.startsWith(PRESENCE_PREFIX) || key.length === PRESENCE_PREFIX.length) {
    return null;
  }
  return key.slice(PRESENCE_PREFIX.length);
};
