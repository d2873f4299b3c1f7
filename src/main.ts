import { parseArgs, USAGE } from './cli/args'
import { run } from './cli/run'
import { toError } from './utils/Errors'
import { Logger, LogLevel } from './utils/Logger'

const logger = Logger.getInstance()

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2))
    if (options.help) {
        console.log(USAGE)
        return
    }

    if (options.quiet) {
        logger.setLogLevel(LogLevel.ERROR)
    } else if (options.verbose) {
        logger.setLogLevel(LogLevel.DEBUG)
        logger.setShowRowDetails(true)
    }

    logger.init('Raytracer gestartet')
    await run(options)
}

main().catch((error: unknown) => {
    const err = toError(error)
    logger.error(err.message)
    logger.debug(err.stack ?? '')
    process.exitCode = 1
})
