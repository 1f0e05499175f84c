// Functions evaluated inside the page. Kept as plain ES5 strings so they run
// unchanged on any page, whatever its own build targets.

const HELPERS = `
  function pathOf(el) {
    function nthOfType(node) {
      var tag = node.tagName.toLowerCase();
      var siblings = node.parentElement ? node.parentElement.children : [];
      var count = 0;
      for (var i = 0; i < siblings.length; i++) {
        if (siblings[i].tagName.toLowerCase() === tag) {
          count++;
          if (siblings[i] === node) return tag + ':nth-of-type(' + count + ')';
        }
      }
      return tag + ':nth-of-type(1)';
    }
    var parts = [];
    var cur = el;
    while (cur && cur !== document.body && cur !== document.documentElement) {
      // An id repeated in the document is no anchor: fall through to the
      // nth-of-type chain so each element keeps a path of its own.
      if (cur.id && document.querySelectorAll('#' + CSS.escape(cur.id)).length === 1) {
        parts.unshift('#' + CSS.escape(cur.id));
        return parts.join(' > ');
      }
      parts.unshift(nthOfType(cur));
      cur = cur.parentElement;
    }
    if (cur === document.documentElement) return 'html';
    parts.unshift('body');
    return parts.join(' > ');
  }

  function isVisible(el) {
    if (!el.isConnected) return false;
    var style = getComputedStyle(el);
    if (style.display === 'none' || style.visibility === 'hidden') return false;
    var rect = el.getBoundingClientRect();
    return rect.width > 0 && rect.height > 0;
  }
`;

export const LOCATE_FN = `function(selector) {
  ${HELPERS}
  var found = document.querySelectorAll(selector);
  var out = [];
  for (var i = 0; i < found.length; i++) {
    out.push({ domPath: pathOf(found[i]), visible: isVisible(found[i]) });
  }
  return out;
}`;

export const PROBE_FN = `function(specs) {
  ${HELPERS}
  return specs.map(function(spec) {
    if (spec.kind === 'count') {
      return { present: true, value: document.querySelectorAll(spec.selector).length };
    }
    var el = document.querySelector(spec.selector);
    if (!el) return { present: false, value: null };
    switch (spec.kind) {
      case 'visible': return { present: true, value: isVisible(el) };
      case 'classList': return { present: true, value: Array.prototype.join.call(el.classList, ' ') };
      case 'hasClass': return { present: true, value: el.classList.contains(spec.property) };
      case 'scrollTop': return { present: true, value: el.scrollTop };
      case 'style': return { present: true, value: getComputedStyle(el).getPropertyValue(spec.property) };
      case 'attribute': return { present: true, value: el.getAttribute(spec.property) };
      case 'text': return { present: true, value: (el.innerText || el.textContent || '').trim() };
      case 'height': return { present: true, value: el.getBoundingClientRect().height };
      case 'top': return { present: true, value: el.getBoundingClientRect().top };
      default: throw new Error('Unknown probe kind: ' + spec.kind);
    }
  });
}`;

// Installs a mutation observer on first use; later calls report how long the
// DOM has been quiet.
export const SETTLE_FN = `function() {
  var w = window;
  if (!w.__settlecheckQuiet) {
    w.__settlecheckQuiet = { last: performance.now() };
    new MutationObserver(function() {
      w.__settlecheckQuiet.last = performance.now();
    }).observe(document.documentElement, {
      childList: true, subtree: true, attributes: true, characterData: true,
    });
  }
  var busy = document.querySelectorAll(
    '.htmx-request, .htmx-swapping, .htmx-settling, .htmx-added'
  ).length;
  var running = 0;
  if (typeof document.getAnimations === 'function') {
    running = document.getAnimations().filter(function(a) {
      return a.playState === 'running';
    }).length;
  }
  return {
    readyState: document.readyState,
    htmxBusy: busy,
    runningAnimations: running,
    quietForMs: Math.round(performance.now() - w.__settlecheckQuiet.last),
  };
}`;

export const CLICK_POINT_FN = `function(domPath) {
  var el = document.querySelector(domPath);
  if (!el) return null;
  if (typeof el.scrollIntoViewIfNeeded === 'function') {
    el.scrollIntoViewIfNeeded(true);
  } else {
    el.scrollIntoView({ block: 'nearest', inline: 'nearest' });
  }
  var rect = el.getBoundingClientRect();
  return { x: rect.left + rect.width / 2, y: rect.top + rect.height / 2 };
}`;

export const FILL_FN = `function(domPath, value) {
  var el = document.querySelector(domPath);
  if (!el) return false;
  el.focus();
  if (el.isContentEditable) {
    el.innerText = value;
    el.dispatchEvent(new Event('input', { bubbles: true }));
    return true;
  }
  var proto = el.tagName === 'TEXTAREA'
    ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype;
  var desc = Object.getOwnPropertyDescriptor(proto, 'value');
  if (desc && desc.set) {
    desc.set.call(el, value);
  } else {
    el.value = value;
  }
  el.dispatchEvent(new Event('input', { bubbles: true }));
  el.dispatchEvent(new Event('change', { bubbles: true }));
  return true;
}`;

export const SCROLL_TO_FN = `function(selector, top) {
  var el = document.querySelector(selector);
  if (!el) return null;
  el.scrollTop = top;
  return el.scrollTop;
}`;

export const VIEWPORT_EXPR = "({ width: window.innerWidth, height: window.innerHeight })";
export const READY_STATE_EXPR = "document.readyState";
export const URL_EXPR = "location.href";
export const HTML_EXPR = "document.documentElement.outerHTML";

/** Expression that calls a page function with JSON-encoded arguments. */
export function invoke(fn: string, ...args: unknown[]): string {
  return `(${fn})(${args.map((a) => JSON.stringify(a)).join(", ")})`;
}
