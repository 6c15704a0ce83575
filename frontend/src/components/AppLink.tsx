import React from 'react';
import type { UrlRequest } from '../types/game';
import { classifyUrlRequest } from '../services/navigation';

interface AppLinkProps {
  href: string;
  onNavigate: (request: UrlRequest) => void;
  className?: string;
  children: React.ReactNode;
  'aria-current'?: 'page';
}

// Only plain primary clicks are taken over; modified clicks keep browser behaviour
const isPlainClick = (e: React.MouseEvent<HTMLAnchorElement>): boolean =>
  e.button === 0 && !e.defaultPrevented && !e.metaKey && !e.ctrlKey && !e.shiftKey && !e.altKey;

export const AppLink: React.FC<AppLinkProps> = ({ href, onNavigate, className, children, ...rest }) => {
  const handleClick = (e: React.MouseEvent<HTMLAnchorElement>) => {
    if (!isPlainClick(e)) return;
    e.preventDefault();
    onNavigate(classifyUrlRequest(href, window.location.origin));
  };

  return (
    <a href={href} className={className} onClick={handleClick} {...rest}>
      {children}
    </a>
  );
};
