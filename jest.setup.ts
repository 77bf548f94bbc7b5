import '@testing-library/jest-dom';
import React from 'react';

// Render next/image as a plain <img>; drop the props <img> does not know
jest.mock('next/image', () => ({
  __esModule: true,
  default: function MockImage(
    props: React.ComponentProps<'img'> & {
      fill?: boolean;
      unoptimized?: boolean;
      priority?: boolean;
    }
  ) {
    const { fill, unoptimized, priority, ...imgProps } = props;
    return React.createElement('img', {
      ...imgProps,
      'data-fill': fill ? 'true' : undefined,
      'data-unoptimized': unoptimized ? 'true' : undefined,
      fetchPriority: priority ? 'high' : undefined,
    });
  },
}));
