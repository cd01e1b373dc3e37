export interface Theme {
  name: string;
  colors: {
    primary: string;
    secondary: string;
    accent: string;
    text: string;
    success: string;
    error: string;
    warning: string;
  };
}

export const themes: Record<string, Theme> = {
  default: {
    name: 'Default',
    colors: {
      primary: 'white',
      secondary: 'grey',
      accent: '#3b82f6',
      text: 'white',
      success: 'green',
      error: 'red',
      warning: 'yellow'
    }
  },
  ember: {
    name: 'Ember',
    colors: {
      primary: '#f97316',
      secondary: 'grey',
      accent: '#f59e0b',
      text: 'white',
      success: 'green',
      error: 'red',
      warning: 'yellow'
    }
  }
};

export function getTheme(themeName: string): Theme {
  return themes[themeName] ?? themes.default;
}
