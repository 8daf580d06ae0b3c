export const PATTERNS = {
    // %{expression}
    INTERPOLATION: /%\{([^}]*)\}/g,

    // %{expression} when it is the whole string
    WHOLE_INTERPOLATION: /^%\{([^}]*)\}$/,

    // method('arg') or method("arg")
    METHOD: /^(\w+)\((?:"([^"]*)"|'([^']*)')\)$/,

    // leading :: marks a top scope variable
    TOP_SCOPE: /^::/,
};

export const METHOD_NAMES = ['lookup', 'hiera', 'alias', 'literal', 'scope'] as const;

export type MethodName = typeof METHOD_NAMES[number];
