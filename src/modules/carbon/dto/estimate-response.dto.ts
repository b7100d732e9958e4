import { NO_FILE_UPLOADED_MESSAGE } from '../../../common/constants/error-messages.constants';
import { FALLBACK_CARBON_KG, UNKNOWN_DISH_NAME, type EstimateResult } from '../domain/estimate-result';

export type EstimateResponseDto = EstimateResult;

/** Body of the 400 returned when the multipart request carries no usable file. */
export function buildMissingUploadResponse(): EstimateResponseDto {
  return {
    dish: UNKNOWN_DISH_NAME,
    estimatedCarbonKg: FALLBACK_CARBON_KG,
    ingredients: [],
    error: NO_FILE_UPLOADED_MESSAGE,
  };
}
