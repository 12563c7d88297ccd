#!/usr/bin/env node

import { Command } from "commander"
import { consola } from "consola"
import { initCommand } from "@/src/commands/init"
import { installCommand } from "@/src/commands/install"
import { reinstallCommand } from "@/src/commands/reinstall"
import { stateCommand } from "@/src/commands/state"
import { uninstallCommand } from "@/src/commands/uninstall"
import { updateCommand } from "@/src/commands/update"
import { PLUGSMITH_VERSION } from "@/src/constants"

interface ProgramOptions {
	quiet?: boolean
	root?: string
	verbose?: boolean
}

const LOG_LEVEL_QUIET = 1
const LOG_LEVEL_VERBOSE = 4

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("plugsmith")
		.description("Keep a host application's plugins and themes in step with extensions.toml")
		.version(PLUGSMITH_VERSION)
		.option("--root <path>", "Application root (defaults to PLUGSMITH_ROOT or the cwd)")
		.option("--verbose", "Print debug output")
		.option("--quiet", "Only print errors")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program.hook("preAction", () => {
		const options = program.opts<ProgramOptions>()
		if (options.verbose) {
			consola.level = LOG_LEVEL_VERBOSE
		} else if (options.quiet) {
			consola.level = LOG_LEVEL_QUIET
		}
	})

	const globals = () => ({ root: program.opts<ProgramOptions>().root })

	program
		.command("init")
		.description("Create an example extensions.toml")
		.action(async () => {
			await initCommand(globals())
		})

	program
		.command("install", { isDefault: true })
		.description("Install, update and remove extensions to match extensions.toml")
		.option("--dry-run", "Show the planned changes without applying them")
		.action(async (options: { dryRun?: boolean }) => {
			await installCommand({ ...globals(), dryRun: Boolean(options.dryRun) })
		})

	program
		.command("uninstall")
		.description("Remove every installed extension and the installed-state record")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (options: { yes?: boolean }) => {
			await uninstallCommand({ ...globals(), yes: Boolean(options.yes) })
		})

	program
		.command("reinstall")
		.description("Delete and fetch one installed extension again")
		.argument("<name>", "Extension name")
		.action(async (name: string) => {
			await reinstallCommand(name, globals())
		})

	program
		.command("update")
		.description("Fetch the latest commits for installed extensions")
		.argument("[names...]", "Extension names (all when omitted)")
		.action(async (names: string[]) => {
			await updateCommand(names, globals())
		})

	program
		.command("state")
		.description("Show the installed extensions")
		.action(async () => {
			await stateCommand(globals())
		})

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
