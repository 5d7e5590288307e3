import TrackedLink from '../components/TrackedLink';

// Splits free text (guidance, descriptions) into spans, turning http(s) URLs into links.
export const renderTextWithLinks = (text: string) => {
  const urlRegex = /(https?:\/\/[^\s)]+)/g;
  const parts = text.split(urlRegex);

  return parts.map((part, i) => {
    // split() with a capture group puts the URLs at odd positions
    if (i % 2 === 1) {
      return (
        <TrackedLink
          key={i}
          href={part}
          target="_blank"
          rel="noopener noreferrer"
        >
          {part}
        </TrackedLink>
      );
    }
    return <span key={i}>{part}</span>;
  });
};
