import { describe, it, expect } from 'vitest'
import { centeredFreeSpace, parseModelConfig } from '../modelConfig'
import { ModelConfigError, UnknownVariantError } from '../errors'

describe('parseModelConfig', () => {
  it('rejects documents without the bowtie.model format tag', () => {
    expect(() => parseModelConfig({ config: {} })).toThrow(ModelConfigError)
    expect(() => parseModelConfig(null)).toThrow('Invalid config file format.')
  })

  it('falls back to the centered preset', () => {
    expect(parseModelConfig({ format: 'bowtie.model' })).toEqual(centeredFreeSpace)
  })

  it('reads a ground-offset variant with custom gaps', () => {
    const config = parseModelConfig({
      format: 'bowtie.model',
      config: {
        title: 'offset',
        domain: { x: 0.2, y: 0.12, z: 0.12 },
        variant: { kind: 'ground-offset', axis: 'z', position: 0.02 },
        gaps: [
          { axis: 'x', cells: 1 },
          { axis: 'z', cells: 2 },
        ],
        waveform: { frequency: 2e9 },
        source: { type: 'voltage_source' },
      },
    })
    expect(config.variant).toEqual({ kind: 'ground-offset', axis: 'z', position: 0.02 })
    expect(config.gaps).toEqual([
      { axis: 'x', cells: 1 },
      { axis: 'z', cells: 2 },
    ])
    expect(config.waveform).toEqual({ type: 'gaussian', amplitude: 1, frequency: 2e9, id: 'bowtie_pulse' })
    expect(config.source).toEqual({ type: 'voltage_source', impedance: 73 })
    expect(config.spacing).toEqual(centeredFreeSpace.spacing)
  })

  it('reports unknown placement variants and axes', () => {
    expect(() => parseModelConfig({ format: 'bowtie.model', config: { variant: { kind: 'floating' } } })).toThrow(
      UnknownVariantError
    )
    expect(() =>
      parseModelConfig({ format: 'bowtie.model', config: { variant: { kind: 'ground-offset', axis: 'w', position: 1 } } })
    ).toThrow(UnknownVariantError)
  })

  it('rejects malformed sections', () => {
    expect(() => parseModelConfig({ format: 'bowtie.model', config: { domain: { x: 'wide', y: 1, z: 1 } } })).toThrow(
      'domain.x must be a number'
    )
    expect(() => parseModelConfig({ format: 'bowtie.model', config: { waveform: { type: 'square' } } })).toThrow(
      ModelConfigError
    )
    expect(() => parseModelConfig({ format: 'bowtie.model', config: { gaps: [{ axis: 'x', cells: 1 }] } })).toThrow(
      'gaps must list exactly two wing gaps'
    )
  })

  it('rejects a non-boolean domainView', () => {
    expect(() =>
      parseModelConfig({ format: 'bowtie.model', config: { variant: { kind: 'centered', domainView: 'yes' } } })
    ).toThrow('variant.domainView must be a boolean')
  })

  it('rejects blank or spaced identifiers', () => {
    expect(() => parseModelConfig({ format: 'bowtie.model', config: { waveform: { id: '' } } })).toThrow(
      'waveform.id must be a single non-blank token'
    )
    expect(() => parseModelConfig({ format: 'bowtie.model', config: { waveform: { id: 'my pulse' } } })).toThrow(
      ModelConfigError
    )
  })
})
