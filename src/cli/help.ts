/**
 * @fileoverview Detailed help text for docshelf CLI commands
 */

const HELP_TEXT = {
  main: `
docshelf - Publish and unpublish MkDocs articles

Moves markdown files between docs/ (published) and drafts/ and regenerates
the nav section of mkdocs.yml.

USAGE:
    docshelf [command] [options]

COMMANDS:
    interactive         Choose articles to publish or unpublish (default)
    list                List published and draft articles
    publish <path...>   Move drafts into docs/ and update the nav
    unpublish <path...> Move articles from docs/ into drafts/ and update the nav
    nav                 Regenerate the mkdocs.yml nav from docs/
    check               Report nav entries and articles that are out of sync
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Site root holding mkdocs.yml (default: current directory)
    --force             Overwrite destination files that already exist
    --list              Same as the list command
    --verbose           Log debug details to stderr
    --json              Machine-readable output and errors

CONFIGURATION:
    DOCSHELF_WORKSPACE  Site root when --workspace is not given
    docshelf.yml        Optional overrides in the site root:
                          docsDir, draftsDir, mkdocsFile, homePage,
                          aboutPage, reservedPages, sections

EXAMPLES:
    docshelf
    docshelf list --json
    docshelf unpublish agents/loops.md
    docshelf publish llm/rag.md --force
    docshelf check

For more information on a specific command, run:
    docshelf help <command>
`,

  interactive: `
docshelf interactive - Choose articles to publish or unpublish

USAGE:
    docshelf [interactive] [--force]

Shows a menu (1 unpublish, 2 publish, 3 list), then the numbered candidate
articles. Select items by number and range, e.g. "1 2 5-7"; press Enter to
cancel or q to quit. The nav is regenerated after the moves.

OPTIONS:
    --force             Overwrite destination files that already exist
`,

  list: `
docshelf list - List published and draft articles

USAGE:
    docshelf list [--json]

Reserved pages (index.md and about.md by default) are not listed.

OPTIONS:
    --json              Print {"published": [...], "drafts": [...]}
`,

  publish: `
docshelf publish - Move drafts into the docs tree

USAGE:
    docshelf publish <path...> [--force] [--json]

Paths are relative to the drafts dir, e.g. "llm/rag.md". All paths are
checked before anything moves.
`,

  unpublish: `
docshelf unpublish - Move published articles into the drafts tree

USAGE:
    docshelf unpublish <path...> [--force] [--json]

Paths are relative to the docs dir, e.g. "agents/loops.md".
`,

  nav: `
docshelf nav - Regenerate the mkdocs.yml nav

USAGE:
    docshelf nav [--json]

Everything from the "nav:" line to the end of mkdocs.yml is replaced. When the
file has no nav, one is appended.
`,

  check: `
docshelf check - Compare the mkdocs.yml nav with the docs tree

USAGE:
    docshelf check [--json]

Exits with 1 when a nav entry points at a missing file or a published article
is not in the nav. Articles outside every nav section are reported on their
own, since regenerating the nav does not list them.
`,
} as const;

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(out: (line: string) => void, command?: string): void {
  out(getHelpText(command));
}
