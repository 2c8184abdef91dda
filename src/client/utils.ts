export const formulateUrl = (uri: string) => {
  return `${import.meta.env.BASE_URL}/${uri}`.replaceAll("//", "/");
};

export function formatStat(value: number, fractionDigits = 2): string {
  return value.toFixed(fractionDigits);
}

export function formatBucketRange(start: number, end: number): string {
  return `${formatStat(start)} - ${formatStat(end)}`;
}

export async function getSafeErrorResponse(
  response: Response,
  defaultErrorMessage?: string,
) {
  let errorResponse;
  try {
    errorResponse = (await response.json()) as { message: string };
  } catch (e) {
    errorResponse = {
      message: defaultErrorMessage || "An unknown error occurred.",
    };
  }
  return errorResponse;
}
