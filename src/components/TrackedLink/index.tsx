import React from 'react';
import { trackEvent } from '../../utils/analytics';

type TrackedLinkProps = React.AnchorHTMLAttributes<HTMLAnchorElement>;

export const TrackedLink: React.FC<TrackedLinkProps> = ({ href, onClick, children, ...rest }) => {
  const handleClick = (e: React.MouseEvent<HTMLAnchorElement>) => {
    trackEvent('link_click', { href });
    onClick?.(e);
  };

  return (
    <a href={href} onClick={handleClick} {...rest}>
      {children}
    </a>
  );
};

export default TrackedLink;
