import React, { useState, useEffect } from 'react';
import { Text } from 'ink';
import { Theme } from '../config/themes.js';

interface GlowingTextProps {
  text: string;
  theme: Theme;
}

interface Rgb {
  r: number;
  g: number;
  b: number;
}

const hexToRgb = (hex: string): Rgb | null => {
  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  return result
    ? {
        r: parseInt(result[1], 16),
        g: parseInt(result[2], 16),
        b: parseInt(result[3], 16),
      }
    : null;
};

const rgbToHex = ({ r, g, b }: Rgb): string => {
  return '#' + [r, g, b].map(x => Math.max(0, Math.min(255, Math.round(x))).toString(16).padStart(2, '0')).join('');
};

const mix = (from: string, to: string, factor: number): string => {
  const a = hexToRgb(from);
  const b = hexToRgb(to);
  if (!a || !b) return from;
  return rgbToHex({
    r: a.r + (b.r - a.r) * factor,
    g: a.g + (b.g - a.g) * factor,
    b: a.b + (b.b - a.b) * factor,
  });
};

const GLOW_RADIUS = 6;

const GlowingText: React.FC<GlowingTextProps> = ({ text, theme }) => {
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    if (!text) return;
    const interval = setInterval(() => {
      setFrame(prev => (prev + 1) % text.length);
    }, 60);
    return () => clearInterval(interval);
  }, [text]);

  const colorAt = (distance: number): string => {
    if (distance === 0) return '#ffffff';
    if (distance <= GLOW_RADIUS) return mix('#ffffff', theme.colors.accent, distance / GLOW_RADIUS);
    return theme.colors.secondary;
  };

  return (
    <Text>
      {text.split('').map((char, i) => (
        <Text key={i} color={colorAt(Math.abs(frame - i))}>
          {char}
        </Text>
      ))}
    </Text>
  );
};

export default GlowingText;
