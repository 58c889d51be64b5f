/**
 * Aggregation Autoencoder
 *
 * Feed-forward compressor for aggregated feature vectors:
 *   encoder: input -> 128 -> 64 -> 32   (ReLU after every layer)
 *   decoder: 32 -> 64 -> 128 -> input   (ReLU, ReLU, linear)
 *
 * Trained supervised: the input is an entity's decayed history aggregate and
 * the target is what the entity produced on the cutoff date, so the latent
 * code has to carry what predicts the next performance.
 *
 * Weights are plain arrays; the model is serialized as JSON together with the
 * column order it was trained on.
 */

import { z } from 'zod';
import { ENCODER_CONFIG } from '../src/config.js';
import { ModelFormatError } from '../src/errors.js';

export interface Encoder {
  readonly inputDim: number;
  readonly latentDim: number;
  encode(input: readonly number[]): number[];
}

type Activation = 'relu' | 'linear';

interface DenseLayer {
  weights: number[][]; // [out][in]
  bias: number[];
  activation: Activation;
}

export interface TrainingSample {
  input: readonly number[];
  target: readonly number[];
}

export interface FitOptions {
  epochs?: number;
  learningRate?: number;
  shuffle?: boolean;
  /** Log progress every N epochs (0 = silent) */
  logEvery?: number;
}

export interface AutoencoderOptions {
  random?: () => number;
  columns?: string[];
}

const LayerSchema = z.object({
  weights: z.array(z.array(z.number())),
  bias: z.array(z.number()),
  activation: z.enum(['relu', 'linear']),
});

const ModelFileSchema = z.object({
  version: z.literal(1),
  inputDim: z.number().int().positive(),
  encodingDims: z.array(z.number().int().positive()).min(1),
  columns: z.array(z.string()),
  encoder: z.array(LayerSchema).min(1),
  decoder: z.array(LayerSchema).min(1),
});

export type AutoencoderModelFile = z.infer<typeof ModelFileSchema>;

export class AggregationAutoencoder implements Encoder {
  readonly inputDim: number;
  readonly encodingDims: number[];
  /** Feature column order the model expects (empty if unknown) */
  readonly columns: string[];

  private encoderLayers: DenseLayer[];
  private decoderLayers: DenseLayer[];
  private random: () => number;

  constructor(
    inputDim: number,
    encodingDims: number[] = ENCODER_CONFIG.encodingDims,
    options: AutoencoderOptions = {},
  ) {
    if (!Number.isInteger(inputDim) || inputDim < 1) {
      throw new RangeError(`inputDim must be a positive integer, got ${inputDim}`);
    }
    if (encodingDims.length === 0) {
      throw new RangeError('encodingDims must not be empty');
    }
    if (options.columns && options.columns.length !== inputDim) {
      throw new RangeError(`Got ${options.columns.length} columns for inputDim ${inputDim}`);
    }

    this.inputDim = inputDim;
    this.encodingDims = [...encodingDims];
    this.columns = options.columns ? [...options.columns] : [];
    this.random = options.random ?? Math.random;

    const encSizes = [inputDim, ...encodingDims];
    this.encoderLayers = [];
    for (let i = 0; i < encodingDims.length; i++) {
      this.encoderLayers.push(this.initLayer(encSizes[i], encSizes[i + 1], 'relu'));
    }

    const decSizes = [...encSizes].reverse();
    this.decoderLayers = [];
    for (let i = 0; i < decSizes.length - 1; i++) {
      const isLast = i === decSizes.length - 2;
      this.decoderLayers.push(this.initLayer(decSizes[i], decSizes[i + 1], isLast ? 'linear' : 'relu'));
    }
  }

  get latentDim(): number {
    return this.encodingDims[this.encodingDims.length - 1];
  }

  encode(input: readonly number[]): number[] {
    this.checkDim(input, this.inputDim, 'input');
    return last(runLayers(this.encoderLayers, input));
  }

  decode(latent: readonly number[]): number[] {
    this.checkDim(latent, this.latentDim, 'latent');
    return last(runLayers(this.decoderLayers, latent));
  }

  forward(input: readonly number[]): number[] {
    return this.decode(this.encode(input));
  }

  /**
   * Mean squared error over samples (no update)
   */
  loss(samples: readonly TrainingSample[]): number {
    if (samples.length === 0) return 0;
    let total = 0;
    for (const s of samples) {
      this.checkDim(s.target, this.inputDim, 'target');
      total += mse(this.forward(s.input), s.target);
    }
    return total / samples.length;
  }

  /**
   * One SGD step on a single sample. Returns the sample's loss before the update.
   */
  trainStep(sample: TrainingSample, learningRate: number): number {
    this.checkDim(sample.input, this.inputDim, 'input');
    this.checkDim(sample.target, this.inputDim, 'target');

    const layers = [...this.encoderLayers, ...this.decoderLayers];
    const activations = runLayers(layers, sample.input);
    const output = last(activations);
    const n = output.length;

    // dL/dy for L = mean((y - t)^2)
    let grad = output.map((y, i) => (2 * (y - sample.target[i])) / n);

    for (let l = layers.length - 1; l >= 0; l--) {
      const layer = layers[l];
      const input = activations[l];
      const out = activations[l + 1];
      const delta = grad.map((g, j) => (layer.activation === 'relu' && out[j] <= 0 ? 0 : g));

      // Gradient w.r.t. the layer input, before the weights move
      const nextGrad = new Array<number>(input.length).fill(0);
      for (let j = 0; j < delta.length; j++) {
        if (delta[j] === 0) continue;
        const row = layer.weights[j];
        for (let k = 0; k < input.length; k++) {
          nextGrad[k] += row[k] * delta[j];
        }
      }

      for (let j = 0; j < delta.length; j++) {
        if (delta[j] === 0) continue;
        const row = layer.weights[j];
        for (let k = 0; k < input.length; k++) {
          row[k] -= learningRate * delta[j] * input[k];
        }
        layer.bias[j] -= learningRate * delta[j];
      }

      grad = nextGrad;
    }

    return mse(output, sample.target);
  }

  /**
   * Per-sample SGD over all samples. Returns mean loss per epoch.
   */
  fit(samples: readonly TrainingSample[], options: FitOptions = {}): number[] {
    const epochs = options.epochs ?? ENCODER_CONFIG.epochs;
    const learningRate = options.learningRate ?? ENCODER_CONFIG.learningRate;
    const shuffle = options.shuffle ?? true;
    const logEvery = options.logEvery ?? 10;

    if (samples.length === 0) return [];

    const history: number[] = [];
    const order = samples.map((_, i) => i);

    for (let epoch = 1; epoch <= epochs; epoch++) {
      if (shuffle) this.shuffleInPlace(order);

      let total = 0;
      for (const idx of order) {
        total += this.trainStep(samples[idx], learningRate);
      }
      const epochLoss = total / samples.length;
      history.push(epochLoss);

      if (logEvery > 0 && (epoch % logEvery === 0 || epoch === epochs)) {
        console.log(`[autoencoder] epoch ${epoch}/${epochs} loss=${epochLoss.toFixed(6)}`);
      }
    }

    return history;
  }

  toJSON(): AutoencoderModelFile {
    return {
      version: 1,
      inputDim: this.inputDim,
      encodingDims: [...this.encodingDims],
      columns: [...this.columns],
      encoder: this.encoderLayers.map(cloneLayer),
      decoder: this.decoderLayers.map(cloneLayer),
    };
  }

  /**
   * Restore a model saved with toJSON(). Throws ModelFormatError on a
   * malformed file or inconsistent layer shapes.
   */
  static fromJSON(data: unknown): AggregationAutoencoder {
    const parsed = ModelFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new ModelFormatError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }
    const file = parsed.data;

    const model = new AggregationAutoencoder(file.inputDim, file.encodingDims, {
      columns: file.columns.length > 0 ? file.columns : undefined,
    });

    const issues = [
      ...shapeIssues('encoder', file.encoder, model.encoderLayers),
      ...shapeIssues('decoder', file.decoder, model.decoderLayers),
    ];
    if (issues.length > 0) throw new ModelFormatError(issues);

    model.encoderLayers = file.encoder.map(cloneLayer);
    model.decoderLayers = file.decoder.map(cloneLayer);
    return model;
  }

  // ─── Internals ───

  /** Weights and biases ~ U(-1/sqrt(fanIn), 1/sqrt(fanIn)) */
  private initLayer(fanIn: number, fanOut: number, activation: Activation): DenseLayer {
    const bound = 1 / Math.sqrt(fanIn);
    const uniform = () => (this.random() * 2 - 1) * bound;
    const weights: number[][] = [];
    for (let j = 0; j < fanOut; j++) {
      const row: number[] = [];
      for (let k = 0; k < fanIn; k++) row.push(uniform());
      weights.push(row);
    }
    const bias: number[] = [];
    for (let j = 0; j < fanOut; j++) bias.push(uniform());
    return { weights, bias, activation };
  }

  private shuffleInPlace(arr: number[]): void {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
  }

  private checkDim(vec: readonly number[], expected: number, label: string): void {
    if (vec.length !== expected) {
      throw new RangeError(`Expected ${label} of length ${expected}, got ${vec.length}`);
    }
  }
}

// ─── Helpers ───

/** activations[0] is the input, activations[i + 1] the output of layer i */
function runLayers(layers: readonly DenseLayer[], input: readonly number[]): number[][] {
  const activations: number[][] = [[...input]];
  let x: number[] = activations[0];
  for (const layer of layers) {
    const out = layer.weights.map((row, j) => {
      let s = layer.bias[j];
      for (let k = 0; k < row.length; k++) s += row[k] * x[k];
      return layer.activation === 'relu' ? Math.max(0, s) : s;
    });
    activations.push(out);
    x = out;
  }
  return activations;
}

function last(activations: number[][]): number[] {
  return activations[activations.length - 1];
}

function mse(output: readonly number[], target: readonly number[]): number {
  let s = 0;
  for (let i = 0; i < output.length; i++) s += (output[i] - target[i]) ** 2;
  return s / output.length;
}

function cloneLayer(layer: DenseLayer): DenseLayer {
  return {
    weights: layer.weights.map(row => [...row]),
    bias: [...layer.bias],
    activation: layer.activation,
  };
}

function shapeIssues(label: string, saved: readonly DenseLayer[], expected: readonly DenseLayer[]): string[] {
  if (saved.length !== expected.length) {
    return [`${label}: expected ${expected.length} layers, got ${saved.length}`];
  }
  const issues: string[] = [];
  saved.forEach((layer, i) => {
    const want = expected[i];
    const rowsOk = layer.weights.length === want.weights.length;
    const colsOk = layer.weights.every(r => r.length === want.weights[0].length);
    if (!rowsOk || !colsOk || layer.bias.length !== want.bias.length) {
      issues.push(`${label}[${i}]: expected ${want.weights.length}x${want.weights[0].length} weights`);
    }
    if (layer.activation !== want.activation) {
      issues.push(`${label}[${i}]: expected ${want.activation} activation`);
    }
  });
  return issues;
}
