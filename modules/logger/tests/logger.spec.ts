import * as fs from 'fs'
import * as Tmp from 'tmp-promise'

import { createDefaultLogger } from '../src/logger'

async function readContent(path: string, sentinel: string): Promise<string> {
  const t0 = Date.now()
  while (true) {
    const content = fs.existsSync(path) ? fs.readFileSync(path, 'utf8') : ''
    if (content.includes(sentinel)) {
      return content
    }
    if (Date.now() - t0 > 2000) {
      throw new Error(`timed out waiting for "${sentinel}" in ${path}`)
    }
    await new Promise(resolve => setTimeout(resolve, 50))
  }
}

describe('logger', () => {
  test('writes the message to a file', async () => {
    const f = await Tmp.file({})
    const logger = createDefaultLogger(f.path, 'moderate', undefined, fs.createWriteStream('/dev/null'))
    logger.info(`Black Sea`)
    logger.info(`-the end-`)

    const content = await readContent(f.path, '-the end-')
    expect(content).toMatch(/\[info\] Black Sea\n/)
  })
  test('drops messages below the log level', async () => {
    const f = await Tmp.file({})
    const logger = createDefaultLogger(f.path, 'moderate', 'info', fs.createWriteStream('/dev/null'))
    logger.debug(`Caspian`)
    logger.info(`-the end-`)

    const content = await readContent(f.path, '-the end-')
    expect(content).not.toContain('Caspian')
  })
  test('prints to the UI stream only messages that pass the pickiness', async () => {
    const { path: logFile } = await Tmp.file({})
    const { path: printFile } = await Tmp.file({ keep: true })
    const logger = createDefaultLogger(logFile, 'moderate', undefined, fs.createWriteStream(printFile))
    logger.print(`Adriatic`, 'low')
    logger.print(`Indian`, 'moderate')
    logger.print(`Pacific`, 'high')
    logger.info('-the end-')

    await readContent(logFile, '-the end-')
    await readContent(printFile, 'Pacific')
    expect(fs.readFileSync(printFile, 'utf-8')).toEqual('Indian\nPacific\n')
  })
  test('additional objects are logged (in JSON format) after the text message', async () => {
    const f = await Tmp.file({})
    const logger = createDefaultLogger(f.path, 'moderate', undefined, fs.createWriteStream('/dev/null'))
    logger.info(`Atlantic`, { maxDepth: 8376, waterVolume: '310,410,900 km^3' })
    logger.info(`-the end-`)

    const content = await readContent(f.path, '-the end-')
    expect(content).toContain(`[info] Atlantic {"maxDepth":8376,"waterVolume":"310,410,900 km^3"}\n`)
  })
  test('wipes out the file', async () => {
    const f = await Tmp.file({})
    const devNull = fs.createWriteStream('/dev/null')

    const logger1 = createDefaultLogger(f.path, 'moderate', undefined, devNull)
    logger1.info(`Atlantic`)
    logger1.info(`EOF-1`)
    expect(await readContent(f.path, 'EOF-1')).toContain('Atlantic')

    const logger2 = createDefaultLogger(f.path, 'moderate', undefined, devNull)
    logger2.info(`Indian`)
    logger2.info(`EOF-2`)

    const content2 = await readContent(f.path, 'EOF-2')
    expect(content2).not.toContain('Atlantic')
    expect(content2.split('\n')[0]).toContain('Indian')
  })
  test('yells when the log file is not absolute', () => {
    expect(() => createDefaultLogger('relative.log', 'moderate')).toThrowError(
      'logFile must be absolute: relative.log',
    )
  })
})
