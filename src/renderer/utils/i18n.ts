/**
 * Internationalization (i18n) System
 * Simple and lightweight translation system
 */

export type Language = 'en' | 'zh-CN'

export interface Translations {
  [key: string]: string | Translations
}

export interface TranslateFn {
  (key: string, params?: Record<string, string | number>): string
}

// English translations
const en: Translations = {
  call: {
    status: {
      terminated: 'Call ended',
      connecting: 'Connecting…',
      ringing: 'Ringing…',
      securing: 'Securing…',
      busy: 'Busy',
      noAnswer: 'No answer',
      failed: 'Call failed',
    },
    nag: {
      descriptionAll: 'You can enable call integration and show caller names in your privacy settings.',
      descriptionPrivacy: 'You can show the name and number of incoming calls in your privacy settings.',
      showSettings: 'Show Settings',
      notNow: 'Not Now',
    },
    audioSource: {
      pickerTitle: 'Audio Output',
      builtInMic: 'Phone',
      builtInSpeaker: 'Speaker',
    },
  },
}

// Chinese (Simplified) translations
const zhCN: Translations = {
  call: {
    status: {
      terminated: '通话已结束',
      connecting: '正在连接…',
      ringing: '正在响铃…',
      securing: '正在加密…',
      busy: '对方忙',
      noAnswer: '无人接听',
      failed: '通话失败',
    },
    nag: {
      descriptionAll: '您可以在隐私设置中启用通话集成并显示来电者姓名。',
      descriptionPrivacy: '您可以在隐私设置中显示来电的姓名和号码。',
      showSettings: '显示设置',
      notNow: '以后再说',
    },
    audioSource: {
      pickerTitle: '音频输出',
      builtInMic: '听筒',
      builtInSpeaker: '扬声器',
    },
  },
}

const translations: Record<Language, Translations> = {
  'en': en,
  'zh-CN': zhCN,
}

function isLanguage(value: string): value is Language {
  return Object.prototype.hasOwnProperty.call(translations, value)
}

function lookup(table: Translations, keys: string[]): string | null {
  let value: string | Translations = table
  for (const k of keys) {
    if (typeof value === 'object' && Object.prototype.hasOwnProperty.call(value, k)) {
      value = value[k]
    } else {
      return null
    }
  }
  return typeof value === 'string' ? value : null
}

export class I18n {
  private currentLanguage: Language = 'en'
  private listeners: Set<() => void> = new Set()

  constructor(initialLanguage?: string) {
    if (initialLanguage) {
      if (isLanguage(initialLanguage)) {
        this.currentLanguage = initialLanguage
      } else if (initialLanguage.startsWith('zh')) {
        this.currentLanguage = 'zh-CN'
      }
    }
  }

  getLanguage(): Language {
    return this.currentLanguage
  }

  setLanguage(lang: Language) {
    if (lang !== this.currentLanguage && translations[lang]) {
      this.currentLanguage = lang
      this.notifyListeners()
    }
  }

  getAvailableLanguages(): { code: Language; name: string }[] {
    return [
      { code: 'en', name: 'English' },
      { code: 'zh-CN', name: '简体中文' },
    ]
  }

  t(key: string, params?: Record<string, string | number>): string {
    const keys = key.split('.')
    // Fallback to English
    const value = lookup(translations[this.currentLanguage], keys) ?? lookup(translations['en'], keys)

    if (value === null) {
      return key
    }

    if (params) {
      return value.replace(/\{(\w+)\}/g, (match, paramKey: string) => {
        return params[paramKey]?.toString() ?? match
      })
    }

    return value
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  private notifyListeners() {
    this.listeners.forEach(listener => listener())
  }
}

export const i18n = new I18n(typeof process !== 'undefined' ? process.env.LANG : undefined)

export const t: TranslateFn = (key, params) => {
  return i18n.t(key, params)
}
