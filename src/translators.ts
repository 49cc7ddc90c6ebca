// Serializes the typed command model into the line-oriented gprMax input dialect.
import type { ModelCommand } from './commands'
import type { GridSpacing, Vec3 } from './types'
import { formatNumber, formatVec } from './util/format'

const VIEW_MODES = { fine: 'f', coarse: 'n' } as const

export function formatCommand(cmd: ModelCommand): string {
  switch (cmd.kind) {
    case 'title':
      return `#title: ${cmd.text.replace(/\s+/g, ' ').trim()}`
    case 'domain':
      return `#domain: ${formatVec(cmd.size)}`
    case 'dx_dy_dz':
      return `#dx_dy_dz: ${formatVec(cmd.step)}`
    case 'time_window':
      return `#time_window: ${formatNumber(cmd.seconds)}`
    case 'waveform': {
      const w = cmd.waveform
      return `#waveform: ${w.type} ${formatNumber(w.amplitude)} ${formatNumber(w.frequency)} ${w.id}`
    }
    case 'source': {
      const s = cmd.source
      // hertzian dipoles carry no internal resistance
      const impedance = s.type === 'hertzian_dipole' ? '' : ` ${formatNumber(s.impedance)}`
      return `#${s.type}: ${s.polarisation} ${formatVec(s.position)}${impedance} ${s.waveformId}`
    }
    case 'rx':
      return `#rx: ${formatVec(cmd.position)}`
    case 'triangle': {
      const t = cmd.triangle
      const coords = t.vertices.map((v) => formatVec(v)).join(' ')
      return `#triangle: ${coords} ${formatNumber(t.thickness)} ${t.material}`
    }
    case 'snapshot': {
      const s = cmd.snapshot
      return `#snapshot: ${box(s.min, s.max, s.step)} ${formatNumber(s.time)} ${s.id}`
    }
    case 'geometry_view': {
      const v = cmd.view
      return `#geometry_view: ${box(v.min, v.max, v.step)} ${v.id} type=${VIEW_MODES[v.mode]}`
    }
    default: {
      const unknown: never = cmd
      throw new Error(`Unsupported command: ${JSON.stringify(unknown)}`)
    }
  }
}

export function translateToGprMax(commands: readonly ModelCommand[]): string {
  return commands.map(formatCommand).join('\n') + '\n'
}

function box(min: Vec3, max: Vec3, step: GridSpacing) {
  return `${formatVec(min)} ${formatVec(max)} ${formatVec([step.dx, step.dy, step.dz])}`
}
