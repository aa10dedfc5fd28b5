/** Teams of a single-game slate, read from "(AAA @ BBB)" in the contest name. */
export interface ShowdownTeams {
  away: string;
  home: string;
}

/** One draftable slate in the DraftKings lobby. Many contests share one group. */
export interface DraftGroup {
  id: string;
  /** Lobby sport code, e.g. "NFL" */
  sport: string;
  gameType: string;
  /** Lobby start label as displayed, e.g. "Sun 1:00PM" */
  startLabel: string | null;
  /** Showdown slates only */
  teams: ShowdownTeams | null;
}

export interface Draftable {
  draftableId: string;
  playerId: string | null;
  name: string;
  position: string | null;
  salary: number | null;
  team: string | null;
  status: string | null;
  competitionId: string | null;
  competitionStart: Date | null;
}

export interface PlayerPool {
  draftGroup: DraftGroup;
  players: Draftable[];
  /** Distinct competitions across the players */
  gameCount: number;
  /** Start of the first listed competition */
  startTime: Date | null;
  retrievedAt: Date;
}
