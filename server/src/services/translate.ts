import { z } from "zod"
import { ExternalServiceError, describeError } from "../lib/errors"
import { createLogger } from "../lib/logger"

const log = createLogger("translate")

export const TRANSLATION_FALLBACK = "Translation service error."

const myMemoryResponseSchema = z.object({
  responseData: z.object({
    translatedText: z.string(),
  }),
})

export interface TranslatorOptions {
  endpoint: string
  timeoutMs: number
  fetch?: typeof fetch
}

export interface Translator {
  /** Always resolves; any upstream failure yields `TRANSLATION_FALLBACK`. */
  translateToUrdu(text: unknown): Promise<string>
}

export function createTranslator({ endpoint, timeoutMs, fetch: fetchImpl = fetch }: TranslatorOptions): Translator {
  async function requestTranslation(text: string): Promise<string> {
    const url = new URL(endpoint)
    url.searchParams.set("q", text)
    url.searchParams.set("langpair", "en|ur")

    let response: Response
    try {
      response = await fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      throw new ExternalServiceError(`Translation request failed: ${describeError(error)}`, { cause: error })
    }

    if (!response.ok) {
      const body = await response.text()
      throw new ExternalServiceError(`Translation error ${response.status}: ${body.slice(0, 200)}`)
    }

    const parsed = myMemoryResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new ExternalServiceError("Unexpected translation response shape")
    }
    return parsed.data.responseData.translatedText
  }

  return {
    async translateToUrdu(text) {
      if (typeof text !== "string" || !text.trim()) return TRANSLATION_FALLBACK
      try {
        return await requestTranslation(text)
      } catch (error) {
        log.warn("translation failed", { error: describeError(error) })
        return TRANSLATION_FALLBACK
      }
    },
  }
}
