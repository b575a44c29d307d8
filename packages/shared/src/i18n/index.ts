import i18next from "i18next";
import de from "./consts/de.json";
import fr from "./consts/fr.json";
import en from "./consts/en.json";

export const supportedLocales = ["de", "fr", "en"] as const;
export type SupportedLocale = (typeof supportedLocales)[number];
export const defaultLocale: SupportedLocale = "de";

/** Maps a language tag such as "fr-CH" onto a supported locale, German otherwise. */
export const resolveLocale = (tag: string | null | undefined): SupportedLocale => {
  const language = tag?.toLowerCase().split(/[-_]/)[0];
  return supportedLocales.find((locale) => locale === language) ?? defaultLocale;
};

const instance = i18next.createInstance();
let ready: Promise<void> | null = null;

export const loadTranslations = (): Promise<void> => {
  ready ??= instance
    .init({
      resources: {
        de: { translation: de },
        fr: { translation: fr },
        en: { translation: en }
      },
      lng: defaultLocale,
      fallbackLng: defaultLocale,
      supportedLngs: supportedLocales,
      interpolation: { escapeValue: false },
      initImmediate: false
    })
    .then(() => undefined);
  return ready;
};

export type TranslateOptions = {
  locale?: string | null;
  values?: Record<string, string | number | null>;
};

export const translate = async (key: string, options: TranslateOptions = {}): Promise<string> => {
  await loadTranslations();
  return String(instance.t(key, { ...options.values, lng: resolveLocale(options.locale) }));
};
