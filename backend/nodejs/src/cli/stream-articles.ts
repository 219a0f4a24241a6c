import { pathToFileURL } from 'url'
import { parseArgs } from 'util'
import { AppConfig, loadConfig } from '@/shared/config/config.js'
import { sanitizeError } from '@/shared/errors/sanitize.js'
import { makeStreamArticles } from '@/use-cases/factories/make-stream-articles.js'
import { StreamArticlesUseCase } from '@/use-cases/stream-articles.js'

const USAGE = 'Usage: stream-articles <search-term> [--date-from YYYY-MM-DD]'

export interface CliIo {
  out: (line: string) => void
  err: (line: string) => void
}

export interface CliDependencies {
  env: Record<string, string | undefined>
  createUseCase: (config: AppConfig) => StreamArticlesUseCase
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
}

/** Runs one search-and-publish and returns the process exit code. */
export async function runCli(
  argv: string[],
  dependencies: CliDependencies,
  io: CliIo = consoleIo
): Promise<number> {
  let positionals: string[]
  let dateFrom: string | undefined
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'date-from': { type: 'string' }
      }
    })
    positionals = parsed.positionals
    dateFrom = parsed.values['date-from']
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error))
    io.err(USAGE)
    return 2
  }

  if (positionals.length !== 1) {
    io.err(USAGE)
    return 2
  }
  const [searchTerm] = positionals

  let config: AppConfig
  try {
    config = loadConfig(dependencies.env)
  } catch (error) {
    const { kind, message } = sanitizeError(error)
    io.err(`${kind}: ${message}`)
    return 1
  }

  const useCase = dependencies.createUseCase(config)
  const result = await useCase.run({
    search_term: searchTerm,
    date_from: dateFrom
  })

  if (!result.ok) {
    io.err(`${result.failure.kind}: ${result.failure.message}`)
    return 1
  }

  io.out(`Found ${result.summary.articlesFound} articles for "${searchTerm}"`)
  io.out(
    `Published ${result.summary.articlesPublished} records to ${config.streamName}`
  )
  return 0
}

const isEntryPoint =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(process.argv[1]).href

if (isEntryPoint) {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    createUseCase: makeStreamArticles
  })
}
