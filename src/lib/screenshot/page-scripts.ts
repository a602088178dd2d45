/**
 * Scripts evaluated inside the captured page
 */

export const DISABLE_ANIMATIONS_CSS = `
*, *::before, *::after {
  animation-duration: 0.01ms !important;
  animation-delay: -0.01ms !important;
  animation-iteration-count: 1 !important;
  background-attachment: initial !important;
  scroll-behavior: auto !important;
  transition-duration: 0ms !important;
  transition-delay: 0ms !important;
}
`;

/**
 * Init script that appends the animation-collapsing style sheet once the
 * document exists.
 */
export function disableAnimationsScript(css: string = DISABLE_ANIMATIONS_CSS): string {
  return `(() => {
  const install = () => {
    const style = document.createElement('style');
    style.textContent = ${JSON.stringify(css)};
    (document.head || document.documentElement).appendChild(style);
  };
  if (document.readyState === 'loading') {
    document.addEventListener('DOMContentLoaded', install, { once: true });
  } else {
    install();
  }
})();`;
}

/**
 * Scrolls one viewport at a time towards the bottom. Returns immediately;
 * the steps keep running in the page.
 */
export function scrollToBottomScript(stepDelay: number): string {
  return `(() => {
  const scrollStep = () => {
    window.scrollBy(0, window.innerHeight);
    if (window.scrollY + window.innerHeight < document.body.scrollHeight) {
      setTimeout(scrollStep, ${stepDelay});
    }
  };
  scrollStep();
})()`;
}

export const SCROLL_TO_TOP_SCRIPT = 'window.scrollTo(0, 0)';
