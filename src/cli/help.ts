/**
 * @fileoverview Detailed help text for dna-synth CLI commands
 */

const HELP_TEXT = {
  main: `
dna-synth - Merge worker findings into one confidence-scored report

USAGE:
    dna-synth <command> [options]

COMMANDS:
    synthesize <pattern...>   Replay captured worker outputs and score them
    config                    Print the effective synthesis configuration
    history                   List archived run reports
    help [command]            Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information

ENVIRONMENT:
    DNA_SYNTH_CONFIG       Configuration file merged over the defaults
    DNA_SYNTH_LOG_LEVEL    debug | info | warn | error | silent (default: info)

EXIT CODES:
    0   success
    1   failure (including a run in which no worker produced anything)
    2   invalid arguments

Run 'dna-synth help <command>' for details on a command.
`,

  synthesize: `
dna-synth synthesize - Replay captured worker outputs and score them

USAGE:
    dna-synth synthesize <pattern...> [options]

Each matched file holds one worker's output:

    {
      "workerId": "stack-detector",
      "phase": "discovery",          // default: "default"
      "mode": "parallel",            // or "sequential"; the first file of a phase decides
      "status": "success",           // or "error"
      "error": "optional message",
      "findings": [ { "section": "stack", "key": "framework", "value": "fastify",
                      "findingType": "framework",
                      "evidence": [ { "sourceKind": "manifest", "locator": "package.json" } ] } ],
      "absences": [ { "section": "operations", "reason": "no deployment config" } ]
    }

Phases run in the order their first file is seen (files are sorted by path).

OPTIONS:
    -c, --config <file>   Configuration file merged over the defaults
    --json                Print the full report as JSON on stdout
    --store <db>          Archive the report in a SQLite database
    --timeout <ms>        Run deadline; also bounds each phase

EXAMPLES:
    dna-synth synthesize 'captures/*.json'
    dna-synth synthesize 'captures/**/*.json' --json --store reports.db
`,

  config: `
dna-synth config - Print the effective synthesis configuration

USAGE:
    dna-synth config [--config <file>]

Prints the defaults merged with the given file (or DNA_SYNTH_CONFIG) as YAML.
The output is itself a valid configuration file.
`,

  history: `
dna-synth history - List archived run reports

USAGE:
    dna-synth history --store <db> [options]

OPTIONS:
    --store <db>          SQLite database written by 'synthesize --store'
    --limit <n>           Number of runs to show, newest first (default: 20)
    --status <status>     Only show complete or failed runs
    --json                Print the summaries as JSON
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return value in HELP_TEXT;
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
