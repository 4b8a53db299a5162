import { loadCopyCli } from './cli.js'

const cli = await loadCopyCli()
await cli.main()
