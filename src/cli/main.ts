/**
 * tfvar-sync CLI (Commander-based)
 *
 * Usage:
 *   tfvar-sync -t app-prod,app-stage outputs.json export_list.txt
 *   tfvar-sync -t app-prod -u outputs.json export_list.txt   # also update existing
 *   tfvar-sync -w                                            # list workspaces
 *
 * Environment:
 *   TFVE_ORGANIZATION_NAME, TFVE_TOKEN (required), TFVE_REQUEST_TIMEOUT_MS
 */

import { Command, CommanderError, Option } from 'commander'
import { loadConnectionConfig } from '../lib/config'
import { TERRAFORM_API } from '../lib/constants'
import { InputError, errorMessage } from '../lib/errors'
import { createLogger, setLogLevel } from '../lib/logger'
import { buildVariableTargets, getOutputs, readExportList } from '../lib/outputs'
import { createTerraformRateLimiter, type Sleep } from '../lib/rate-limit'
import { SyncEngine, formatOutputs, formatSyncReport, formatWorkspaces } from '../lib/sync'
import {
  ApiError,
  TerraformClient,
  TerraformVariablesClient,
  listWorkspaces,
  resolveWorkspaceIds,
  type FetchLike,
} from '../lib/terraform'

const log = createLogger('cli')

// Package info
const pkg = {
  name: 'tfvar-sync',
  version: '0.1.0',
  description: 'Export Terraform output values into HCP Terraform workspace variables',
}

export type CliOptions = {
  baseUrl: string
  targetWorkspaces?: string
  allowUpdate: boolean
  showWorkspaces: boolean
  showOutputs: boolean
  infoLog: boolean
}

/**
 * Seams for tests; production uses process.env, global fetch and stdout.
 */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv
  fetch?: FetchLike
  sleep?: Sleep
  writeOut?: (text: string) => void
  writeErr?: (text: string) => void
}

const EXIT_OK = 0
const EXIT_FAILURE = 1

// =============================================================================
// Commands
// =============================================================================

export function parseWorkspaceNames(raw: string | undefined): string[] {
  if (!raw) return []
  const names = raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '')
  return [...new Set(names)]
}

function createApi(options: CliOptions, deps: CliDependencies): TerraformClient {
  const connection = loadConnectionConfig(deps.env ?? process.env, { baseUrl: options.baseUrl })
  return new TerraformClient({
    connection,
    limiter: createTerraformRateLimiter(),
    fetch: deps.fetch,
    sleep: deps.sleep,
  })
}

export async function runShowWorkspaces(options: CliOptions, deps: CliDependencies): Promise<number> {
  const out = deps.writeOut ?? ((text: string) => process.stdout.write(text))
  const api = createApi(options, deps)
  const workspaces = await listWorkspaces(api)
  out(`${formatWorkspaces(workspaces)}\n`)
  return EXIT_OK
}

export async function runSync(
  outputsPath: string,
  exportListPath: string,
  options: CliOptions,
  deps: CliDependencies
): Promise<number> {
  const out = deps.writeOut ?? ((text: string) => process.stdout.write(text))
  const workspaceNames = parseWorkspaceNames(options.targetWorkspaces)
  if (workspaceNames.length === 0) {
    throw new InputError('INVALID_CONFIG', '--target-workspaces needs at least one workspace name')
  }

  // Local inputs first: any problem here aborts before the first request
  const api = createApi(options, deps)
  const outputs = await getOutputs(outputsPath)
  if (options.showOutputs) {
    out(`${formatOutputs(outputs)}\n`)
  }
  const exportList = await readExportList(exportListPath)
  const targets = buildVariableTargets(exportList, outputs)

  const workspaceIds = resolveWorkspaceIds(await listWorkspaces(api), workspaceNames)
  const engine = new SyncEngine(new TerraformVariablesClient(api))
  let exitCode = EXIT_OK

  // Workspaces are independent; one failing does not stop the others
  for (const [name, workspaceId] of workspaceIds) {
    try {
      const result = await engine.sync(targets, workspaceId, { allowUpdate: options.allowUpdate })
      out(`${formatSyncReport(result, name)}\n`)
      if (result.status === 'failed') exitCode = EXIT_FAILURE
    } catch (error) {
      if (!(error instanceof ApiError)) throw error
      out(`Workspace ${name} (${workspaceId}): failed\n  ${error.message}\n`)
      exitCode = EXIT_FAILURE
    }
  }

  return exitCode
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(deps: CliDependencies = {}, onExit: (code: number) => void = () => {}): Command {
  const program: Command = new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'Show version number')
    .exitOverride()
    .argument('[outputs-file]', 'Output values file written by `terraform output -json`')
    .argument('[export-list]', 'Export list: one `output,variable[,description]` per line')
    .option(
      '-b, --base-url <url>',
      `Terraform API host or API root (${TERRAFORM_API.API_PATH} is added to a bare host)`,
      TERRAFORM_API.DEFAULT_BASE_URL
    )
    .option('-t, --target-workspaces <names>', 'Comma separated workspace names')
    .option('-u, --allow-update', 'Update variables that already exist', false)
    .option('-o, --show-outputs', 'Print the outputs that will be exported', false)
    .option('-l, --info-log', 'Enable info logs (warnings and errors are always shown)', false)
    .addOption(
      new Option('-w, --show-workspaces', 'Show available workspaces and exit')
        .default(false)
        .conflicts(['targetWorkspaces', 'allowUpdate', 'showOutputs'])
    )

  if (deps.writeOut || deps.writeErr) {
    program.configureOutput({
      ...(deps.writeOut ? { writeOut: deps.writeOut } : {}),
      ...(deps.writeErr ? { writeErr: deps.writeErr } : {}),
    })
  }

  program.action(async (outputsFile: string | undefined, exportListFile: string | undefined) => {
    const options = program.opts<CliOptions>()
    if (options.infoLog) setLogLevel('info')

    if (options.showWorkspaces) {
      if (outputsFile !== undefined || exportListFile !== undefined) {
        program.error('error: --show-workspaces does not take file arguments')
      }
      onExit(await runShowWorkspaces(options, deps))
      return
    }

    if (outputsFile === undefined || exportListFile === undefined || options.targetWorkspaces === undefined) {
      program.error(
        'error: <outputs-file>, <export-list> and --target-workspaces are required unless --show-workspaces is set'
      )
    }

    onExit(await runSync(outputsFile, exportListFile, options, deps))
  })

  return program
}

/**
 * Parse argv, run, and return the process exit code.
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const err = deps.writeErr ?? ((text: string) => process.stderr.write(text))
  let exitCode = EXIT_OK
  const program = createProgram(deps, (code) => {
    exitCode = code
  })

  try {
    await program.parseAsync(argv, { from: 'node' })
    return exitCode
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end up here too, with exit code 0
      return error.exitCode
    }
    if (error instanceof InputError || error instanceof ApiError) {
      log.debug('Run aborted', { name: error.name })
      err(`Error: ${error.message}\n`)
      return EXIT_FAILURE
    }
    err(`Unexpected error: ${errorMessage(error)}\n`)
    return EXIT_FAILURE
  }
}
