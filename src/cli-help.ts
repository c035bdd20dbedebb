export const getCliHelp = (): string => `fleetdeck - fleet task console

Usage:
  fleetdeck [command] [options]

Commands:
  (default) console      open the terminal console
  send "<slash command>" run a command in the running console
  graph <fleet>          list a fleet's waypoints
  tail [--limit n] [--no-follow]

Console commands:
  /delivery <fleet> <pickup> <dropoff> [--dispenser id] [--ingestor id] [--at time]
  /loop <fleet> <start> <end> [--repeat n] [--at time]
  /edit <seq> [--at time] [...fields]
  /delete <seq>
  /pause <fleet> <robot>
  /resume <fleet> <robot>
  /schedule pause|resume
  /workcells on|off
  /select <fleet> [robot]
  /queue, /graph <fleet>, /help

Times: now, +90s, +5m, +1h, HH:MM[:SS] (today), or an ISO timestamp.

Options:
  --graph-dir <dir>
  --inbound-socket <path>
  --outbound-socket <path>
  -h, --help
`;
