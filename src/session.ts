import type { HarvestData, PeakCallResult, RawPeakFilterParams } from './types.ts'
import { callPeaks, type CallOptions } from './callPeaks.ts'
import { readHarvestFile } from './parseHarvest.ts'

export interface SessionOptions extends CallOptions {
  load?: (path: string) => Promise<HarvestData>
}

// Keeps the result of the most recently started request that has completed.
// A request that finishes after a newer one has already committed is
// discarded, and a failed request leaves the previous result in place.
export class PeakCallSession {
  private readonly load: (path: string) => Promise<HarvestData>
  private readonly callOptions: CallOptions
  private started = 0
  private committed = 0
  private latest: PeakCallResult | undefined

  constructor(options: SessionOptions) {
    const { load = readHarvestFile, ...callOptions } = options
    this.load = load
    this.callOptions = callOptions
  }

  get current() {
    return this.latest
  }

  async request(
    path: string,
    rawParams: RawPeakFilterParams,
  ): Promise<PeakCallResult | undefined> {
    const id = ++this.started
    const data = await this.load(path)
    const result = callPeaks(data, rawParams, this.callOptions)
    if (id < this.committed) {
      return undefined
    }
    this.committed = id
    this.latest = result
    return result
  }
}
