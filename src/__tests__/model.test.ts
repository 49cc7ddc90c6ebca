import { describe, it, expect } from 'vitest'
import { buildBowtieModel } from '../model'
import { centeredFreeSpace, groundOffsetWithProbe } from '../modelConfig'
import { ModelConfigError } from '../errors'

describe('buildBowtieModel', () => {
  it('renders the centered free-space model', () => {
    const { text } = buildBowtieModel(centeredFreeSpace)
    expect(text).toBe(
      [
        '#title: Bowtie antenna in free space',
        '#domain: 0.2 0.2 0.1',
        '#dx_dy_dz: 0.001 0.001 0.001',
        '#time_window: 3e-09',
        '#waveform: gaussian 1 1e+09 bowtie_pulse',
        '#transmission_line: x 0.1 0.1 0.05 73 bowtie_pulse',
        '#triangle: 0.151 0.1 0.05 0.101 0.05 0.05 0.101 0.15 0.05 0 pec',
        '#triangle: 0.049 0.1 0.05 0.099 0.05 0.05 0.099 0.15 0.05 0 pec',
        '#geometry_view: 0 0 0 0.2 0.2 0.1 0.001 0.001 0.001 bowtie_domain type=n',
        '#geometry_view: 0.047 0.048 0.048 0.153 0.152 0.052 0.001 0.001 0.001 bowtie_detail type=f',
        '',
      ].join('\n')
    )
  })

  it('renders the ground-offset model with one receiver between source and wings', () => {
    const { text } = buildBowtieModel(groundOffsetWithProbe)
    const lines = text.trimEnd().split('\n')
    expect(lines).toEqual([
      '#title: Bowtie antenna above ground',
      '#domain: 0.2 0.12 0.12',
      '#dx_dy_dz: 0.001 0.001 0.001',
      '#time_window: 3e-09',
      '#waveform: gaussian 1 1e+09 bowtie_pulse',
      '#transmission_line: x 0.1 0.06 0.02 73 bowtie_pulse',
      '#rx: 0.1 0.06 0.04',
      '#triangle: 0.151 0.06 0.02 0.101 0.01 0.02 0.101 0.11 0.02 0 pec',
      '#triangle: 0.049 0.06 0.02 0.099 0.01 0.02 0.099 0.11 0.02 0 pec',
      '#geometry_view: 0.047 0.008 0.018 0.153 0.112 0.022 0.001 0.001 0.001 bowtie_detail type=f',
    ])
    expect(lines.filter((l) => l.startsWith('#rx:'))).toHaveLength(1)
  })

  it('produces identical output on repeated builds', () => {
    expect(buildBowtieModel(groundOffsetWithProbe).text).toBe(buildBowtieModel(groundOffsetWithProbe).text)
    expect(buildBowtieModel(centeredFreeSpace).commands).toEqual(buildBowtieModel(centeredFreeSpace).commands)
  })

  it('emits requested snapshots before the geometry views', () => {
    const { text } = buildBowtieModel({
      ...centeredFreeSpace,
      variant: { kind: 'centered', domainView: false },
      snapshots: [{ min: [0, 0, 0], max: [0.2, 0.2, 0.1], step: { dx: 0.002, dy: 0.002, dz: 0.002 }, time: 1e-9, id: 'snap1' }],
    })
    const lines = text.trimEnd().split('\n')
    expect(lines.slice(-2)).toEqual([
      '#snapshot: 0 0 0 0.2 0.2 0.1 0.002 0.002 0.002 1e-09 snap1',
      '#geometry_view: 0.047 0.048 0.048 0.153 0.152 0.052 0.001 0.001 0.001 bowtie_detail type=f',
    ])
  })

  it('renders the one-wing-shifted layout', () => {
    const { text } = buildBowtieModel({
      ...centeredFreeSpace,
      gaps: [
        { axis: 'x', cells: 1 },
        { axis: 'x', cells: 0 },
      ],
    })
    const triangles = text.split('\n').filter((l) => l.startsWith('#triangle:'))
    expect(triangles).toEqual([
      '#triangle: 0.151 0.1 0.05 0.101 0.05 0.05 0.101 0.15 0.05 0 pec',
      '#triangle: 0.05 0.1 0.05 0.1 0.05 0.05 0.1 0.15 0.05 0 pec',
    ])
  })

  it('refuses ids that would split or merge command lines', () => {
    const waveform = { ...centeredFreeSpace.waveform, id: 'a\n#rx: 0 0 0' }
    expect(() => buildBowtieModel({ ...centeredFreeSpace, waveform })).toThrow(ModelConfigError)
    expect(() =>
      buildBowtieModel({
        ...centeredFreeSpace,
        snapshots: [{ min: [0, 0, 0], max: [0.2, 0.2, 0.1], step: centeredFreeSpace.spacing, time: 1e-9, id: 'snap 1' }],
      })
    ).toThrow('snapshots[0].id must be a single non-blank token')
  })
})
