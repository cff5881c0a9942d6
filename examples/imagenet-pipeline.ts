/**
 * ImageNet Data Pipeline Example
 *
 * Streams a directory of class folders through the imagenet2012
 * preprocessing, resuming from the epoch recorded in the output directory.
 *
 * Usage:
 *   npm run example -- ./data/train ./runs/demo [epochs]
 */

import { Logger, pixelprep, type Tensor } from '@pixelprep/core'
import { DataLoader, ImageFolder, getPreprocess } from '@pixelprep/datasets'
import { epochTracker, getCurrentEpoch, getDistributionScope, runEpochEnd } from '@pixelprep/train'

const [dataDir = './data/train', outputDir = './runs/demo', epochArg = '2'] = process.argv.slice(2)
const epochs = Number.parseInt(epochArg, 10)
const batchSize = 32

pixelprep.config({ seed: 42 })
Logger.setLevel('info')

const folder = new ImageFolder(dataDir)
await folder.init()
console.log(`${folder.length} images in ${folder.getClasses().length} classes`)

const { preprocess, outputShape } = getPreprocess('imagenet2012')
const loader = new DataLoader(folder, {
  batchSize,
  shuffle: true,
  onError: 'skip',
  transform: ([image, label], generator): [Tensor, number] => [preprocess(image, true, generator), label],
})

const scope = getDistributionScope(batchSize)
const callbacks = [epochTracker(outputDir)]
const initialEpoch = await getCurrentEpoch(outputDir)

await scope.run(async () => {
  for (let epoch = initialEpoch; epoch < epochs; epoch++) {
    loader.setEpoch(epoch)
    let samples = 0
    for await (const batch of loader) {
      samples += batch.length
    }
    console.log(
      `Epoch ${epoch}: ${samples} samples of [${outputShape.join(', ')}] on ${scope.numReplicas} replica(s)`,
    )
    if (await runEpochEnd(callbacks, { epoch })) {
      break
    }
  }
})
