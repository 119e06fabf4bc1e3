import { describe, it, expect } from 'vitest';
import { ProgressBar } from './ProgressBar';

describe('ProgressBar', () => {
  it('draws the filled part with an arrow head', () => {
    expect(ProgressBar.render(0.5, 10)).toBe('[====>     ]');
  });

  it('draws an empty bar at zero', () => {
    expect(ProgressBar.render(0, 4)).toBe('[    ]');
  });

  it('clamps the fraction', () => {
    expect(ProgressBar.render(2, 4)).toBe('[===>]');
    expect(ProgressBar.render(-1, 4)).toBe('[    ]');
  });

  it('caps the width at 36 cells', () => {
    expect(ProgressBar.render(1, 100)).toBe(`[${'='.repeat(35)}>]`);
  });

  it('uses a quarter of the console width', () => {
    expect(ProgressBar.widthFor(80)).toBe(20);
    expect(ProgressBar.widthFor(83)).toBe(20);
  });
});
