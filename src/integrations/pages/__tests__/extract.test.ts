import { describe, expect, it } from 'vitest'
import { decodeEntities, extractVisibleText } from '../extract.js'

describe('extractVisibleText', () => {
  it('keeps visible text with one line per block', () => {
    const html = [
      '<html><head><title>Event</title><style>p { color: red }</style></head>',
      '<body><p>Tickets&nbsp;on sale</p><script>track()</script>',
      '<div>Билеты появятся позже</div></body></html>',
    ].join('')

    expect(extractVisibleText(html)).toBe('Event\nTickets on sale\nБилеты появятся позже')
  })

  it('drops comments and noscript blocks', () => {
    expect(extractVisibleText('<p>a<!-- hidden --></p><noscript>enable js</noscript><p>b</p>')).toBe('a\nb')
  })

  it('turns <br> into line breaks and collapses spaces', () => {
    expect(extractVisibleText('<span>one</span>   <span>two</span><br/>three')).toBe('one two\nthree')
  })
})

describe('decodeEntities', () => {
  it('decodes named and numeric entities', () => {
    expect(decodeEntities('&lt;b&gt; &amp; &#1041;&#x44B; &laquo;x&raquo;')).toBe('<b> & Бы «x»')
  })

  it('leaves unknown entities alone', () => {
    expect(decodeEntities('&unknown; &#xFFFFFFF;')).toBe('&unknown; &#xFFFFFFF;')
  })
})
