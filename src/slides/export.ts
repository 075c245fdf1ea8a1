import { createWriteStream, promises as fs } from 'node:fs'
import path from 'node:path'
import { finished } from 'node:stream/promises'

import PDFDocument from 'pdfkit'
import sharp from 'sharp'

import type { SlidesLogger } from '../logging/logger.js'

// A4 in PDF points.
const A4_WIDTH = 595.28
const A4_HEIGHT = 841.89
const PAGE_MARGIN = 20

export type PageLayout = {
  pageWidth: number
  pageHeight: number
  x: number
  y: number
  width: number
  height: number
}

function assertSelection(imagePaths: readonly string[]): void {
  if (imagePaths.length === 0) throw new Error('No images selected.')
}

export function slideFileName(index: number, sourcePath: string): string {
  const ext = path.extname(sourcePath) || '.png'
  return `slide_${String(index).padStart(3, '0')}${ext}`
}

/** Copies slides into `destDir` as slide_001.png, slide_002.png, … in the given order. */
export async function exportSlideImages(
  imagePaths: readonly string[],
  destDir: string,
  { logger = null }: { logger?: SlidesLogger | null } = {}
): Promise<string[]> {
  assertSelection(imagePaths)
  await fs.mkdir(destDir, { recursive: true })
  logger?.info(`Exporting ${imagePaths.length} images -> ${destDir}`)
  const written: string[] = []
  for (const [i, src] of imagePaths.entries()) {
    const dest = path.join(destDir, slideFileName(i + 1, src))
    await fs.copyFile(src, dest)
    written.push(dest)
  }
  logger?.info('Image export complete')
  return written
}

/** A4, turned landscape for wide images, with the image fitted inside the margin and centred. */
export function resolvePageLayout(imageWidth: number, imageHeight: number): PageLayout {
  if (!(imageWidth > 0) || !(imageHeight > 0)) {
    throw new Error(`Invalid image size ${imageWidth}x${imageHeight}`)
  }
  const landscape = imageWidth >= imageHeight
  const pageWidth = landscape ? A4_HEIGHT : A4_WIDTH
  const pageHeight = landscape ? A4_WIDTH : A4_HEIGHT
  const scale = Math.min(
    (pageWidth - 2 * PAGE_MARGIN) / imageWidth,
    (pageHeight - 2 * PAGE_MARGIN) / imageHeight
  )
  const width = imageWidth * scale
  const height = imageHeight * scale
  return {
    pageWidth,
    pageHeight,
    x: (pageWidth - width) / 2,
    y: (pageHeight - height) / 2,
    width,
    height,
  }
}

async function loadPageImage(imagePath: string): Promise<{ png: Buffer; width: number; height: number }> {
  try {
    const { data, info } = await sharp(imagePath).png().toBuffer({ resolveWithObject: true })
    return { png: data, width: info.width, height: info.height }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to read slide ${imagePath}: ${message}`)
  }
}

export async function buildSlidesPdf(
  imagePaths: readonly string[],
  pdfPath: string,
  { logger = null }: { logger?: SlidesLogger | null } = {}
): Promise<string> {
  assertSelection(imagePaths)
  logger?.info(`Building PDF: ${imagePaths.length} slides -> ${pdfPath}`)
  await fs.mkdir(path.dirname(pdfPath), { recursive: true })

  const doc = new PDFDocument({ autoFirstPage: false, info: { Title: path.basename(pdfPath) } })
  const out = createWriteStream(pdfPath)
  doc.pipe(out)
  let failure: { error: unknown } | null = null
  try {
    for (const imagePath of imagePaths) {
      const { png, width, height } = await loadPageImage(imagePath)
      const layout = resolvePageLayout(width, height)
      doc.addPage({ size: [layout.pageWidth, layout.pageHeight], margin: 0 })
      doc.image(png, layout.x, layout.y, { width: layout.width, height: layout.height })
    }
  } catch (error) {
    failure = { error }
  } finally {
    doc.end()
    await finished(out)
  }
  if (failure) {
    await fs.rm(pdfPath, { force: true })
    throw failure.error
  }
  logger?.info('PDF saved successfully')
  return pdfPath
}
