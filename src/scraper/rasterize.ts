import sharp from 'sharp'

export type Rasterizer = (image: Buffer) => Promise<Buffer>

// Four times the default 72 dpi.
const RENDER_DENSITY = 288

export const rasterizeSvg: Rasterizer = async (image) =>
  sharp(image, { density: RENDER_DENSITY })
    .flatten({ background: '#ffffff' })
    .png()
    .toBuffer()
