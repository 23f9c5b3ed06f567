import type {
  DrawableHandle,
  SampleHandle,
  SampleInfo,
  SkinComponent,
  TextureHandle,
} from "../../ports/assets"
import type { Lookup } from "../../ports/lookup"
import type { Observable } from "../../ports/observable"
import type { Skin } from "../../ports/skin"

/**
 * Entry point consumers hold on to. Adds nothing of its own; every call goes straight
 * to the skin it was bound to (normally a `ResolutionChain`).
 */
export class SkinRequester implements Skin {
  constructor(private readonly skin: Skin) {}

  getConfig<T>(lookup: Lookup<T>): Observable<T> | null {
    return this.skin.getConfig(lookup)
  }

  getTexture(componentName: string): TextureHandle | undefined {
    return this.skin.getTexture(componentName)
  }

  getSample(sampleInfo: SampleInfo): SampleHandle | undefined {
    return this.skin.getSample(sampleInfo)
  }

  getDrawableComponent(component: SkinComponent): DrawableHandle | undefined {
    return this.skin.getDrawableComponent(component)
  }
}
