// Mirrors C's %g: six significant digits, trailing zeros dropped, two-digit signed exponent
export function formatNumber(value: number, precision = 6): string {
  if (!Number.isFinite(value)) throw new RangeError(`Cannot format non-finite number ${value}`)
  if (value === 0) return '0'
  const [mantissa, rawExp] = value.toExponential(precision - 1).split('e')
  const exp = Number(rawExp)
  if (exp >= -4 && exp < precision) {
    return stripZeros(value.toFixed(precision - 1 - exp))
  }
  const digits = String(Math.abs(exp)).padStart(2, '0')
  return `${stripZeros(mantissa)}e${exp < 0 ? '-' : '+'}${digits}`
}

export function formatVec(values: readonly number[]): string {
  return values.map((v) => formatNumber(v)).join(' ')
}

// Ids and material tags are written unquoted, so they must be one whitespace-free token
export function isIdentifier(value: string): boolean {
  return /^\S+$/.test(value)
}

function stripZeros(text: string) {
  if (!text.includes('.')) return text
  return text.replace(/0+$/, '').replace(/\.$/, '')
}
