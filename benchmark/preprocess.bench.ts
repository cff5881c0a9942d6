/**
 * Preprocessing Benchmarks
 *
 * Times each stage of the ImageNet pipeline on a synthetic 375x500 image,
 * roughly the median ImageNet photo size.
 *
 * Usage:
 *   npm run bench
 *   npm run bench -- --time 2000
 */

import { Bench } from 'tinybench'
import { Generator, Tensor } from '@pixelprep/core'
import {
  aspectPreservingResize,
  centralCrop,
  imagenet2012,
  normalize,
  randomCropAndFlip,
  IMAGENET_MEANS,
  IMAGENET_STDS,
} from '@pixelprep/datasets'

function parseTime(): number {
  const args = process.argv.slice(2)
  const index = args.indexOf('--time')
  const value = index >= 0 ? Number.parseInt(args[index + 1] ?? '', 10) : NaN
  return Number.isNaN(value) ? 1000 : value
}

const pixels = new Uint8Array(375 * 500 * 3)
for (let i = 0; i < pixels.length; i++) {
  pixels[i] = (i * 2654435761) >>> 24
}
const image = new Tensor(pixels, [375, 500, 3], 'uint8')
const resized = aspectPreservingResize(image, 256)
const cropped = centralCrop(resized, 224, 224)
const generator = new Generator(0)

const bench = new Bench({ time: parseTime(), warmup: true })

bench
  .add('aspectPreservingResize 375x500 -> 256', () => {
    aspectPreservingResize(image, 256)
  })
  .add('aspectPreservingResize 375x500 -> 512', () => {
    aspectPreservingResize(image, 512)
  })
  .add('centralCrop 224x224', () => {
    centralCrop(resized, 224, 224)
  })
  .add('randomCropAndFlip 224x224', () => {
    randomCropAndFlip(resized, 224, 224, generator)
  })
  .add('normalize 224x224x3', () => {
    normalize(cropped, IMAGENET_MEANS, IMAGENET_STDS)
  })
  .add('imagenet2012 evaluation', () => {
    imagenet2012(image, false)
  })
  .add('imagenet2012 training', () => {
    imagenet2012(image, true, generator)
  })

console.log('')
console.log('pixelprep Benchmark Suite')
console.log('=========================')
console.log('')

await bench.run()
console.table(bench.table())
