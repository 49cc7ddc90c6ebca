import type { AntennaOrientation } from './types'

// Set BOWTIE_DEBUG=1 to trace reference points and emitted command counts
export const debugEnabled = /^(1|true|yes)$/i.test(process.env.BOWTIE_DEBUG ?? '')

export const DEFAULT_MATERIAL = 'pec'
export const DEFAULT_IMPEDANCE = 73
export const DETAIL_PADDING_CELLS = 2
export const DOMAIN_VIEW_ID = 'bowtie_domain'
export const DETAIL_VIEW_ID = 'bowtie_detail'

export const DEFAULT_ORIENTATION: AntennaOrientation = { longitudinal: 'x', transverse: 'y' }

