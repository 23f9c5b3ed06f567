export type TextureHandle = Readonly<{
  name: string
  width: number
  height: number
}>

export type SampleHandle = Readonly<{
  name: string
}>

export type DrawableHandle = Readonly<{
  component: string
}>

export type SkinComponent = Readonly<{
  lookupName: string
}>

export type SampleInfo = Readonly<{
  /** Candidate names, most preferred first. */
  lookupNames: readonly string[]
}>

/**
 * Asset retrieval for a single source. Decoding is left to whoever populates it.
 */
export interface SkinAssets {
  getTexture(componentName: string): TextureHandle | undefined
  getSample(sampleInfo: SampleInfo): SampleHandle | undefined
  getDrawableComponent(component: SkinComponent): DrawableHandle | undefined
}
