// Command policy: the one place where an integrator can veto a command before it is spawned.
// The server ships with allowAll. The executor runs whatever the caller sends, and this
// hook is where an allow-list or audit step would plug in.

export type PolicyVerdict = { allowed: true } | { allowed: false; reason: string };

export type CommandPolicy = (command: string) => PolicyVerdict | Promise<PolicyVerdict>;

export const allowAll: CommandPolicy = () => ({ allowed: true });
