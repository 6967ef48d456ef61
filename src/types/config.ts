export interface CLIOptions {
  password?: boolean;
  secret?: boolean;
  once?: boolean;
  allPlayers?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}
