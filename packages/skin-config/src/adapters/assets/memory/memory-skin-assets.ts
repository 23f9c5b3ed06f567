import type {
  DrawableHandle,
  SampleHandle,
  SampleInfo,
  SkinAssets,
  SkinComponent,
  TextureHandle,
} from "../../../ports/assets"

export type MemorySkinAssetsInit = {
  textures?: readonly TextureHandle[]
  samples?: readonly SampleHandle[]
  drawables?: readonly DrawableHandle[]
}

/**
 * Map-backed assets for a source, keyed by texture/sample name and component.
 */
export class MemorySkinAssets implements SkinAssets {
  private readonly textures: Map<string, TextureHandle>
  private readonly samples: Map<string, SampleHandle>
  private readonly drawables: Map<string, DrawableHandle>

  constructor(init: MemorySkinAssetsInit = {}) {
    this.textures = new Map((init.textures ?? []).map((t) => [t.name, t]))
    this.samples = new Map((init.samples ?? []).map((s) => [s.name, s]))
    this.drawables = new Map((init.drawables ?? []).map((d) => [d.component, d]))
  }

  getTexture(componentName: string): TextureHandle | undefined {
    return this.textures.get(componentName)
  }

  getSample(sampleInfo: SampleInfo): SampleHandle | undefined {
    for (const name of sampleInfo.lookupNames) {
      const sample = this.samples.get(name)
      if (sample) return sample
    }
    return undefined
  }

  getDrawableComponent(component: SkinComponent): DrawableHandle | undefined {
    return this.drawables.get(component.lookupName)
  }
}
