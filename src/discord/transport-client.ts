import { Team } from 'discord.js';
import type {
  ActivitiesOptions,
  Client,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';

// ---------------------------------------------------------------------------
// TransportClient interface
// ---------------------------------------------------------------------------

/**
 * The parts of the logged-in discord.js client that bootstrap and the
 * administrative commands need. Keeps the orchestrator testable without a
 * gateway connection.
 */
export interface TransportClient {
  /** The bot user's tag, e.g. "trackbot#0420". */
  readonly userTag: string;
  /** Gateway heartbeat latency in ms; -1 until the first heartbeat. */
  readonly pingMs: number;
  /** Set the bot's activity. */
  setPresenceActivity(activity: ActivitiesOptions): void;
  /** Replace the global slash command list. Returns the number of commands Discord accepted. */
  syncCommands(commands: RESTPostAPIChatInputApplicationCommandsJSONBody[]): Promise<number>;
  /** User IDs owning the application (the owner, or every member of the owning team). */
  fetchApplicationOwners(): Promise<Set<string>>;
}

// ---------------------------------------------------------------------------
// DiscordTransportClient: delegates to a ready discord.js Client
// ---------------------------------------------------------------------------

export class DiscordTransportClient implements TransportClient {
  constructor(private readonly client: Client<true>) {}

  get userTag(): string {
    return this.client.user.tag;
  }

  get pingMs(): number {
    return this.client.ws.ping;
  }

  setPresenceActivity(activity: ActivitiesOptions): void {
    this.client.user.setActivity(activity);
  }

  async syncCommands(commands: RESTPostAPIChatInputApplicationCommandsJSONBody[]): Promise<number> {
    const synced = await this.client.application.commands.set(commands);
    return synced.size;
  }

  async fetchApplicationOwners(): Promise<Set<string>> {
    const application = await this.client.application.fetch();
    const owner = application.owner;
    if (!owner) return new Set();
    if (owner instanceof Team) return new Set(owner.members.map((member) => member.id));
    return new Set([owner.id]);
  }
}
