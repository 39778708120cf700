import { runFleetCommand } from '../src/cli/fleetCommands'

const exitCode = runFleetCommand(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
})

process.exitCode = exitCode
