import { copyFile, constants } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { defineCli, loadArgSpec } from 'argbind'
import type { Cli } from 'argbind'

export async function loadCopyCli(): Promise<Cli> {
  const spec = await loadArgSpec(fileURLToPath(new URL('./argspec.yaml', import.meta.url)))
  if (!spec.ok) {
    throw new Error(spec.error.map(e => `${e.path}: ${e.message}`).join('\n'))
  }

  return defineCli({
    spec: spec.value,
    async run({ positionals: [inFile, outFile], named }) {
      const mode = named.create_new === true ? constants.COPYFILE_EXCL : 0
      await copyFile(String(inFile), String(outFile), mode)
      console.error(`Copied ${inFile} to ${outFile}`)
    },
  })
}
