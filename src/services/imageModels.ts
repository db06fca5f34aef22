/** Image generation backends accepted by the image endpoint's `model` parameter. */
export const ImageModel = {
  FLUX: "flux",
  FLUX_REALISM: "flux-realism",
  ANY_DARK: "any-dark",
  FLUX_ANIME: "flux-anime",
  FLUX_3D: "flux-3d",
  TURBO: "turbo",
} as const;

export type ImageModel = (typeof ImageModel)[keyof typeof ImageModel];

const DISPLAY_NAMES: Record<ImageModel, string> = {
  flux: "Flux",
  "flux-realism": "Flux Realism",
  "any-dark": "Any Dark",
  "flux-anime": "Flux Anime",
  "flux-3d": "Flux 3D",
  turbo: "Turbo",
};

export const IMAGE_MODELS: readonly ImageModel[] = Object.values(ImageModel);

export function isImageModel(value: unknown): value is ImageModel {
  return typeof value === "string" && IMAGE_MODELS.some((model) => model === value);
}

export function getModelDisplayName(model: ImageModel): string {
  return DISPLAY_NAMES[model];
}
