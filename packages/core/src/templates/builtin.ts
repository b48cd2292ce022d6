export const HEADER_TEMPLATE = `<!DOCTYPE html>
<h2>Release distribution area</h2>
<p>
  This directory holds released artifacts. Each release is signed; verify the
  signatures and checksums of anything you download before using it.
</p>
<ul>
  <li><a href="source/">source/</a>: source archives</li>
  <li><a href="binaries/">binaries/</a>: binary archives</li>
</ul>
<hr>
`;

export const README_TEMPLATE = `<!DOCTYPE html>
<h2>{{artifactId}} {{version}}</h2>
<p>
  Files for {{artifactId}} version {{version}}. The release notes are in
  <a href="RELEASE-NOTES.txt">RELEASE-NOTES.txt</a> and the project site is at
  <a href="{{siteUrl}}">{{siteUrl}}</a>.
</p>
<p>
  Source archives are under <code>source/</code> and binary archives under
  <code>binaries/</code>. Older releases are moved to the archive area.
</p>
`;
