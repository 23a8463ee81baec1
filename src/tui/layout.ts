export const LIST_TOP = 4;
// Rendered as: separator (1) + input field (1) + status line (1)
export const FOOTER_HEIGHT = 3;

export function getListHeight(screenHeight: number): number {
  return Math.max(1, screenHeight - LIST_TOP - FOOTER_HEIGHT + 1);
}

/** Keep the selected row inside the visible window. */
export function getScrollTop(selected: number, scrollTop: number, listHeight: number): number {
  if (selected < scrollTop) return selected;
  if (selected >= scrollTop + listHeight) return Math.max(0, selected - listHeight + 1);
  return scrollTop;
}
