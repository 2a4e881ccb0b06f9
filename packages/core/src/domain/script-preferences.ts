export interface ScriptDisplayMode {
  useScriptioContinua: boolean;
  useInterpuncts: boolean;
  useIotaAdscript: boolean;
  useNominaSacra: boolean;
  removeModernPunctuation: boolean;
}

export interface ScriptPreferences {
  authenticMode: boolean;
  latin: ScriptDisplayMode;
  greekClassical: ScriptDisplayMode;
  greekKoine: ScriptDisplayMode;
}

export function defaultScriptDisplayMode(): ScriptDisplayMode {
  return {
    useScriptioContinua: false,
    useInterpuncts: false,
    useIotaAdscript: true,
    useNominaSacra: false,
    removeModernPunctuation: false,
  };
}

export function defaultScriptPreferences(): ScriptPreferences {
  return {
    authenticMode: false,
    latin: defaultScriptDisplayMode(),
    greekClassical: defaultScriptDisplayMode(),
    greekKoine: defaultScriptDisplayMode(),
  };
}
