import React, { useState, useEffect } from 'react';
import { Text } from 'ink';

const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

interface SpinnerProps {
  text?: string;
  color?: string;
}

export function Spinner({ text, color = 'cyan' }: SpinnerProps) {
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    const timer = setInterval(() => setFrame((prev) => (prev + 1) % frames.length), 80);
    return () => clearInterval(timer);
  }, []);

  return (
    <Text>
      <Text color={color}>{frames[frame]}</Text>
      {text ? <Text> {text}</Text> : null}
    </Text>
  );
}
