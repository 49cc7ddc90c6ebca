import { Vector3 } from 'three'
import type { Triangle } from '../types'
import { formatVec } from '../util/format'

function faceNormal(tri: Triangle) {
  const [a, b, c] = tri.vertices.map((v) => new Vector3(...v))
  return new Vector3().subVectors(b, a).cross(new Vector3().subVectors(c, a)).normalize()
}

// Wavefront OBJ of the conductor wings, one face per triangle
export function exportOBJ(triangles: readonly Triangle[]) {
  let out = ''
  for (const tri of triangles) {
    for (const v of tri.vertices) {
      out += `v ${formatVec(v)}\n`
    }
  }
  for (let i = 0; i < triangles.length; i++) {
    const idx = i * 3
    out += `f ${idx + 1} ${idx + 2} ${idx + 3}\n`
  }
  return out
}

export function exportSTL(triangles: readonly Triangle[], name = 'bowtie') {
  let out = `solid ${name}\n`
  for (const tri of triangles) {
    const n = faceNormal(tri)
    out += `  facet normal ${formatVec([n.x, n.y, n.z])}\n`
    out += `    outer loop\n`
    for (const v of tri.vertices) {
      out += `      vertex ${formatVec(v)}\n`
    }
    out += `    endloop\n`
    out += `  endfacet\n`
  }
  out += `endsolid ${name}\n`
  return out
}
