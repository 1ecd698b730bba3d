// Hand-written alert bodies shaped like the three notification templates

export const PAYMENT_HTML = `
<html><body>
<p>Dear Customer,</p>
<table>
  <tr><th colspan="2">Transaction details</th></tr>
  <tr><td>Date &amp; Time:</td><td>26 Sep 2025 11:56</td></tr>
  <tr><td>Amount:</td><td>SGD 25.00</td></tr>
  <tr><td>To:</td><td><span>NTUC</span>
      FAIRPRICE</td></tr>
</table>
</body></html>`;

export const RECEIVED_HTML = `
<html><body>
<div>
  <p>Dear Customer,</p>
  <p>You have received SGD 1,250.00 on 24 Sep 2025 18:09 SGT.</p>
  <p><strong>From:</strong> JOHN TAN</p>
  <p><strong>To:</strong> MY SAVINGS ACCOUNT</p>
</div>
</body></html>`;

export const CARD_HTML = `
<html><body>
<table><tr><td>
  <p>Transaction Ref: 12345</p>
  <p>Dear Card Member,</p>
  <p>Date &amp; Time: 26 Sep 11:56 (SGT)<br>Amount: SGD 12.30<br>From: DBS/POSB card ending 1234<br>To: GRAB*RIDES</p>
</td></tr></table>
</body></html>`;

export const UNRELATED_HTML = `
<html><body><p>Your statement is ready. Log in to view it.</p></body></html>`;
