import { debugEnabled } from '../config'

const TAG = '[Bowtie]'

export function logDebug(msg: string, ...args: unknown[]) {
  if (!debugEnabled) return
  // eslint-disable-next-line no-console
  console.debug(TAG, msg, ...args)
}

export function logWarn(msg: string, ...args: unknown[]) {
  // eslint-disable-next-line no-console
  console.warn(TAG, msg, ...args)
}
