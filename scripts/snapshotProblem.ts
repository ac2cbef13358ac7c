import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { env } from '../src/config.js'
import { logger } from '../src/lib/logger.js'
import { withSdamGiaClient } from '../src/scraper/client.js'
import { clientOptionsFromEnv } from '../src/services/sdamgiaService.js'

const args = process.argv.slice(2)
const recognizeText = args.includes('--recognize')
const problemArg = args.find((arg) => !arg.startsWith('--'))

const saveFile = async (name: string, payload: string) => {
  await mkdir(env.scraperDebugDir, { recursive: true })
  const filePath = join(env.scraperDebugDir, name)
  await writeFile(filePath, payload, 'utf8')
  logger.info({ filePath }, 'Saved problem snapshot')
}

const run = async () => {
  if (!problemArg || !/^\d+$/.test(problemArg)) {
    throw new Error('Usage: snapshotProblem <problemId> [--recognize]')
  }
  const problemId = Number.parseInt(problemArg, 10)

  const problem = await withSdamGiaClient(clientOptionsFromEnv(), (client) =>
    client.getProblem(problemId, { recognizeText }),
  )

  await saveFile(`problem-${problemId}.json`, JSON.stringify(problem, null, 2))
}

run().catch((error) => {
  logger.error({ err: error }, 'Snapshot failed')
  process.exit(1)
})
