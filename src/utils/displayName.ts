interface NamedUser {
  username: string;
  globalName?: string | null;
}

interface NamedMember {
  nick?: string | null;
}

/**
 * Name shown for a user inside a guild: nickname, then global display name,
 * then the account username.
 */
export function resolveDisplayName(
  user: NamedUser,
  member?: NamedMember | null,
): string {
  return member?.nick || user.globalName || user.username;
}
