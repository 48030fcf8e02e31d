/**
 * HTML fixtures shared by the scraper tests
 */

export function vendorTablePage(rows: Array<{ name: string; title: string; email?: string; phone?: string }>): string {
  const body = rows
    .map(row => `
      <tr class="s-table-body__row">
        <td><img src="/headshots/${row.name.split(' ')[0].toLowerCase()}.jpg" alt=""></td>
        <td><a href="/staff/${row.name.split(' ')[0].toLowerCase()}">${row.name}</a></td>
        <td>${row.title}</td>
        <td>${row.phone ?? ''}</td>
        <td>${row.email ? `<a href="mailto:${row.email}">${row.email}</a>` : ''}</td>
      </tr>`)
    .join('');

  return `
    <html>
      <body>
        <table class="s-table">
          <thead><tr><th></th><th>Name</th><th>Title</th><th>Phone</th><th>Email</th></tr></thead>
          <tbody>${body}</tbody>
        </table>
      </body>
    </html>`;
}

export const GENERIC_TABLE_PAGE = `
  <html>
    <body>
      <table>
        <tr><th>Name</th><th>Title</th><th>Phone</th><th>Email</th></tr>
        <tr><td colspan="4">Athletics Department</td></tr>
        <tr>
          <td>Pat Rivera</td>
          <td>Director of Athletics</td>
          <td>555-201-3000</td>
          <td><a href="mailto:privera@example.edu">Email</a></td>
        </tr>
        <tr><td>Football</td></tr>
        <tr>
          <td><img src="/img/lee.jpg"></td>
          <td><a href="/bio/lee">Sam Lee</a></td>
          <td>Head Coach</td>
          <td><a href="mailto:slee@example.edu">slee@example.edu</a> (555) 201-3001</td>
        </tr>
      </table>
    </body>
  </html>`;

export const DEFINITION_LIST_PAGE = `
  <html>
    <body>
      <dl>
        <dt>Swimming</dt>
        <dd>Jane Doe - Head Coach <a href="mailto:jane@x.com">jane@x.com</a> 555-111-2222</dd>
        <dd>Jones – Diving Coach</dd>
        <dd>   </dd>
      </dl>
      <dl>
        <dd>Kim Assistant</dd>
      </dl>
    </body>
  </html>`;

export const NO_STRUCTURE_PAGE = `
  <html>
    <body>
      <h1>Staff Directory</h1>
      <p>Our staff directory is moving. Please check back soon.</p>
    </body>
  </html>`;
