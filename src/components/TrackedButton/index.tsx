import React from 'react';
import { trackEvent } from '../../utils/analytics';

type TrackingProperties = Record<string, string | number | boolean | undefined>;

interface TrackedButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  trackingName: string;
  trackingProperties?: TrackingProperties;
}

// A <button> that records a `button_click` event before running its handler.
export const TrackedButton: React.FC<TrackedButtonProps> = ({
  trackingName,
  trackingProperties,
  onClick,
  type = 'button',
  children,
  ...rest
}) => {
  const handleClick = (e: React.MouseEvent<HTMLButtonElement>) => {
    trackEvent('button_click', { button: trackingName, ...trackingProperties });
    onClick?.(e);
  };

  return (
    <button type={type} onClick={handleClick} {...rest}>
      {children}
    </button>
  );
};

export default TrackedButton;
