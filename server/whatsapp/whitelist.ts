/**
 * Academic channel whitelist. Only whitelisted chats feed extraction;
 * commands are answered everywhere.
 */

export type ProcessDecision = {
  process: boolean;
  reason: "command" | "academic_channel" | "not_whitelisted";
};

export class Whitelist {
  private readonly academicChannels: Set<string>;

  constructor(channels: readonly string[]) {
    this.academicChannels = new Set(channels.map((c) => c.trim()).filter(Boolean));
    if (this.academicChannels.size === 0) {
      console.warn("[Whitelist] No ACADEMIC_CHANNELS configured; assignment extraction is disabled");
    } else {
      console.log(`[Whitelist] ${this.academicChannels.size} academic channel(s) configured`);
    }
  }

  isAcademicChannel(chatId: string): boolean {
    return this.academicChannels.has(chatId);
  }

  shouldProcess(chatId: string, isCommand: boolean): ProcessDecision {
    if (isCommand) return { process: true, reason: "command" };
    return this.isAcademicChannel(chatId)
      ? { process: true, reason: "academic_channel" }
      : { process: false, reason: "not_whitelisted" };
  }
}
